import {
  DefinitionSealedError,
  InvalidAddInitializerTimingError,
  InvalidInitializerError,
  isFunction,
} from '@adorn/common';

import type { Initializer, InitializerPlacement } from './types';

/**
 * The `addInitializer` handed to a single decorator invocation. It stops accepting callbacks as
 * soon as that decorator returns.
 */
export class InitializerGate {
  private open = true;

  constructor(
    private readonly registry: InitializerRegistry,
    private readonly decoratorId: string,
    private readonly placement: InitializerPlacement,
  ) {}

  readonly addInitializer = (initializer: Initializer): void => {
    if (!this.open) {
      throw new InvalidAddInitializerTimingError(this.decoratorId);
    }

    if (!isFunction(initializer)) {
      throw new InvalidInitializerError(this.decoratorId);
    }

    this.registry.register(this.placement, initializer);
  };

  close(): void {
    this.open = false;
  }
}

export class InitializerRegistry {
  private readonly initializers: Record<InitializerPlacement, Initializer[]> = {
    instance: [],
    static: [],
    class: [],
  };
  private sealed = false;

  open(decoratorId: string, placement: InitializerPlacement): InitializerGate {
    return new InitializerGate(this, decoratorId, placement);
  }

  register(placement: InitializerPlacement, initializer: Initializer): void {
    if (this.sealed) {
      throw new DefinitionSealedError('Initializers');
    }

    this.initializers[placement].push(initializer);
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  list(placement: InitializerPlacement): ReadonlyArray<Initializer> {
    return this.initializers[placement];
  }

  run(placement: InitializerPlacement, thisArg: unknown): void {
    for (const initializer of this.initializers[placement]) {
      initializer.call(thisArg);
    }
  }
}
