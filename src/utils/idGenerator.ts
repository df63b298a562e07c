/**
 * Call ID generator for a transport
 * Generates monotonically increasing numeric IDs, shared by every handle of one transport
 *
 * Note: IDs are unique per transport, not globally.
 */
export class IDGenerator {
  private nextId: number;

  /**
   * Create a new ID generator
   * @param startId - First ID handed out (default: 1)
   */
  constructor(startId = 1) {
    this.nextId = startId;
  }

  /**
   * Return the next ID and advance the counter
   */
  next(): number {
    return this.nextId++;
  }
}
