/**
 * 异步互斥锁
 *
 * - 等待者按 FIFO 顺序获得锁
 * - 不可重入：持锁期间再次 acquire 同一把锁会永久等待
 */
export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    if (!this.locked) {
      throw new Error('Mutex.release() called while not locked');
    }

    const next = this.queue.shift();
    if (next) {
      // 锁直接移交给下一个等待者，locked 保持 true
      next();
    } else {
      this.locked = false;
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** 当前排队等待的调用数 */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * 持锁执行操作，无论成功或抛错都会释放
   */
  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await operation();
    } finally {
      this.release();
    }
  }
}
