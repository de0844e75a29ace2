import { Injectable } from '@nestjs/common';
import { ProxyRecord } from '../types/proxy-record';
import { PoolStateMachine } from './pool-state-machine.service';

/**
 * Round-robin over the selectable proxies. The cursor is shared by every
 * caller so consecutive dispatches spread over the pool.
 */
@Injectable()
export class ProxySelectorService {
  private cursor = 0;

  constructor(private readonly stateMachine: PoolStateMachine) {}

  next(): ProxyRecord | null {
    const candidates = this.stateMachine.selectable();
    if (candidates.length === 0) {
      return null;
    }

    const record = candidates[this.cursor % candidates.length];
    this.cursor += 1;
    return record.snapshot();
  }
}
