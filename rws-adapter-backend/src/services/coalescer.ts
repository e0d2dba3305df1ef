import logger from "../utility/logger";

/**
 * Lets concurrent callers asking for the same key share one in-flight
 * operation instead of starting a second one.
 */
export class KeyedCoalescer<T> {
  private inFlight = new Map<string, Promise<T>>();

  public run(key: string, task: () => Promise<T>): Promise<T> {
    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug(`Joining in-flight refresh for ${key}`);
      return pending;
    }
    const promise = task().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }
}
