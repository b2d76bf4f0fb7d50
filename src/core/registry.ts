import { UnregisteredIdentifierError } from './errors.js';

export type Factory<T> = () => T;

/**
 * 字串 id 對應 factory 的註冊表
 *
 * plugin 與 channel 都在啟動時組好一份，查不到的 id 直接丟 UnregisteredIdentifierError。
 */
export class Registry<T> {
  private factories = new Map<string, Factory<T>>();

  constructor(private readonly kind: string) {}

  register(id: string, factory: Factory<T>): this {
    if (this.factories.has(id)) {
      throw new Error(`${this.kind} already registered: ${id}`);
    }
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  resolve(id: string): Factory<T> {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new UnregisteredIdentifierError(this.kind, id);
    }
    return factory;
  }

  create(id: string): T {
    return this.resolve(id)();
  }

  ids(): string[] {
    return Array.from(this.factories.keys());
  }
}
