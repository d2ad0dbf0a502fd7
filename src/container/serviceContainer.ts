import type { Disposable } from 'vscode-languageserver-protocol';

export type ServiceFactory<T> = (container: ServiceContainer) => T;

/**
 * Extremely small dependency injection container so each module can be
 * unit-tested independently. The container lazily instantiates services
 * and disposes them, newest first, with itself.
 */
export class ServiceContainer implements Disposable {
  private readonly instances = new Map<string, unknown>();
  private readonly factories = new Map<string, ServiceFactory<unknown>>();
  private readonly subscriptions: Disposable[] = [];

  registerSingleton<T>(key: string, factory: ServiceFactory<T>): void {
    if (this.factories.has(key)) {
      throw new Error(`Service "${key}" is already registered`);
    }
    this.factories.set(key, factory);
  }

  resolve<T>(key: string): T {
    if (this.instances.has(key)) {
      return this.instances.get(key) as T;
    }
    const factory = this.factories.get(key);
    if (!factory) {
      throw new Error(`Service "${key}" has not been registered`);
    }
    const instance = factory(this);
    this.instances.set(key, instance);
    if (isDisposable(instance)) {
      this.subscriptions.push(instance);
    }
    return instance as T;
  }

  dispose(): void {
    while (this.subscriptions.length > 0) {
      this.subscriptions.pop()?.dispose();
    }
    this.instances.clear();
  }
}

function isDisposable(value: unknown): value is Disposable {
  return typeof value === 'object' && value !== null && 'dispose' in value && typeof value.dispose === 'function';
}
