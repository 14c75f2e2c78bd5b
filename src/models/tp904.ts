import { BaseModel } from './base.js';

/**
 * TP904: two probe sockets. Broadcasts shrink to 7 bytes and
 * snapshots to 6, with the same field layout as the TP902.
 */
export class Tp904Model extends BaseModel {
  readonly id = 'tp904';
  readonly name = 'TP904';
  readonly probeCount = 2;
  readonly namePattern = /^TP904/i;
}
