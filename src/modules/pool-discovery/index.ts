export { PoolDiscovery } from './pool-discovery.service.js';
