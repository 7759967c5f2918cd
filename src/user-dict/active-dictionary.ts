/**
 * 分析器当前生效的用户词典
 *
 * 单写多读：只有编译流水线（持编译锁）调用 set/clear，
 * 分词等读取方可随时无锁调用 current()。
 */

/**
 * 编译流水线需要的窄接口
 */
export interface ActiveDictionaryHandle {
  current(): string | null;
  set(artifactPath: string): void;
  clear(): void;
}

export type ActiveDictionaryListener = (artifactPath: string | null) => void;

export class ActiveDictionarySlot implements ActiveDictionaryHandle {
  private artifactPath: string | null = null;
  private readonly listeners = new Set<ActiveDictionaryListener>();

  current(): string | null {
    return this.artifactPath;
  }

  set(artifactPath: string): void {
    this.artifactPath = artifactPath;
    this.notify();
  }

  clear(): void {
    if (this.artifactPath === null) {
      return;
    }
    this.artifactPath = null;
    this.notify();
  }

  /**
   * 订阅变更，分析器绑定可借此重新加载词典
   *
   * @returns 取消订阅函数
   */
  subscribe(listener: ActiveDictionaryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this.artifactPath);
    }
  }
}
