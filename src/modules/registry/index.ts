export { Registry } from './registry.service.js';
export type { NewPoolReference } from './registry.service.js';
