import { AsyncOpGroup } from './AsyncOpGroup.js';

/**
 * Tracks outstanding reads, e.g. ranged downloads whose bytes are consumed
 * by the completion continuation
 */
export class ReadGroup extends AsyncOpGroup {
  constructor() {
    super('read');
  }
}
