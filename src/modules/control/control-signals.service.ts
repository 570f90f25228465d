import { z } from 'zod';
import type { Container } from '../../infra/container.js';
import { redisKey } from '../../infra/redis.js';

export type ControlSignal = 'stop' | 'sell-all';

export interface SignalRecord {
  actor: string;
  requestedAt: string;
}

export interface ControlStatus {
  stop: SignalRecord | null;
  sellAll: SignalRecord | null;
}

const signalRecordSchema = z.object({
  actor: z.string(),
  requestedAt: z.string(),
});

/**
 * Operator signals for the control loop, kept in Redis so that they can be
 * raised from outside the process and observed by the loop on its next tick.
 */
export class ControlSignals {
  private readonly container: Container;

  constructor(container: Container) {
    this.container = container;
  }

  async requestStop(actor: string): Promise<void> {
    await this.raise('stop', actor);
  }

  async requestSellAll(actor: string): Promise<void> {
    await this.raise('sell-all', actor);
  }

  async clear(signal: ControlSignal): Promise<void> {
    await this.container.redis.del(this.key(signal));
    this.container.logger.info({ signal }, 'Control signal cleared');
  }

  async status(): Promise<ControlStatus> {
    const [stop, sellAll] = await this.container.redis.mget(this.key('stop'), this.key('sell-all'));
    return {
      stop: this.parse('stop', stop),
      sellAll: this.parse('sell-all', sellAll),
    };
  }

  private async raise(signal: ControlSignal, actor: string): Promise<void> {
    const record: SignalRecord = { actor, requestedAt: new Date().toISOString() };
    await this.container.redis.set(this.key(signal), JSON.stringify(record));
    this.container.logger.warn({ signal, actor }, 'Control signal raised');
  }

  private parse(signal: ControlSignal, raw: string | null | undefined): SignalRecord | null {
    if (raw === null || raw === undefined) return null;

    try {
      return signalRecordSchema.parse(JSON.parse(raw));
    } catch (err) {
      this.container.logger.warn({ err, signal }, 'Malformed control signal, treating as raised');
      return { actor: 'unknown', requestedAt: new Date(0).toISOString() };
    }
  }

  private key(signal: ControlSignal): string {
    return redisKey(this.container.redisKeyPrefix, 'control', signal);
  }
}
