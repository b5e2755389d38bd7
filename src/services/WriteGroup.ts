import { AsyncOpGroup } from './AsyncOpGroup.js';

/**
 * Tracks outstanding writes so that their continuations (manifest updates
 * and the like) run in the order the writes were issued
 */
export class WriteGroup extends AsyncOpGroup {
  constructor() {
    super('write');
  }
}
