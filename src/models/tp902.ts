import { BaseModel } from './base.js';

/**
 * TP902: six probe sockets, 15-byte broadcasts.
 */
export class Tp902Model extends BaseModel {
  readonly id = 'tp902';
  readonly name = 'TP902';
  readonly probeCount = 6;
  readonly namePattern = /^TP902/i;
}
