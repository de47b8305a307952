import type { Class } from '@adorn/common';

import type { MetadataStore } from '../decorators';

// Key: decorated class constructor, Value: its frozen metadata store
const storage = new WeakMap<object, Readonly<MetadataStore>>();

export class MetadataStorage {
  /**
   * Creates the store shared by every decorator of `target`. Entries of the closest decorated
   * ancestor stay readable through the prototype chain, and assigning one of them defines an own
   * entry instead of writing to the frozen ancestor store.
   */
  static create(target: Class): MetadataStore {
    const store: MetadataStore = Object.create(this.findInherited(target) ?? null);

    return new Proxy(store, {
      set: (own, key, value) =>
        Reflect.defineProperty(own, key, { value, writable: true, enumerable: true, configurable: true }),
    });
  }

  static register(target: object, metadata: Readonly<MetadataStore>): void {
    storage.set(target, metadata);
  }

  static getMetadata(target: object): Readonly<MetadataStore> | undefined {
    return storage.get(target);
  }

  private static findInherited(target: object): Readonly<MetadataStore> | undefined {
    let current: object | null = target;

    while (current !== null && current !== Function.prototype) {
      const metadata = storage.get(current);
      if (metadata) {
        return metadata;
      }

      current = Object.getPrototypeOf(current);
    }

    return undefined;
  }
}

export function getClassMetadata(target: Class): Readonly<MetadataStore> | undefined {
  return MetadataStorage.getMetadata(target);
}
