/**
 * 單一行程內的互斥鎖：以 promise 鏈串接，確保臨界區依序執行。
 * 臨界區內拋出的錯誤會傳回呼叫端，但不會中斷後續排隊的工作。
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(critical: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await critical();
    } finally {
      release();
    }
  }
}
