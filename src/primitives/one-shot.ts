/**
 * @module primitives/one-shot
 * @description Single-fire bridge from a completion callback to a Promise.
 *
 * A bridged call may be completed from several places (the transport reply,
 * an invalidation handler, a timeout). Only the first completion takes
 * effect; later ones are reported as rejected by returning false.
 */

export class OneShotCompletion<T> {
  readonly promise: Promise<T>;
  private settle: ((value: T) => void) | null = null;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.settle = resolve;
    });
  }

  /**
   * Complete with `value`.
   * @returns true for the first completion, false for every later one.
   */
  resolve(value: T): boolean {
    const settle = this.settle;
    if (settle === null) return false;
    this.settle = null;
    settle(value);
    return true;
  }

  get settled(): boolean {
    return this.settle === null;
  }
}
