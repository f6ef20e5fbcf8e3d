import { ResourceClosedError } from '../core/errors.js';

type ResourceState<T> = { kind: 'idle' } | { kind: 'open'; resource: T } | { kind: 'closed' };

/**
 * Explicitly owned resource (an analyzer, a lexicon) opened on first use.
 * Closing is final: the handle then refuses `open` and `use`.
 */
export class ResourceHandle<T> {
  readonly name: string;
  private readonly create: () => T;
  private readonly dispose?: (resource: T) => void;
  private state: ResourceState<T> = { kind: 'idle' };

  constructor(name: string, create: () => T, dispose?: (resource: T) => void) {
    this.name = name;
    this.create = create;
    this.dispose = dispose;
  }

  get isOpen(): boolean {
    return this.state.kind === 'open';
  }

  get isClosed(): boolean {
    return this.state.kind === 'closed';
  }

  open(): T {
    switch (this.state.kind) {
      case 'open':
        return this.state.resource;
      case 'closed':
        throw new ResourceClosedError(this.name);
      case 'idle': {
        const resource = this.create();
        this.state = { kind: 'open', resource };
        return resource;
      }
    }
  }

  use<R>(fn: (resource: T) => R): R {
    return fn(this.open());
  }

  close(): void {
    const state = this.state;
    this.state = { kind: 'closed' };
    if (state.kind === 'open') {
      this.dispose?.(state.resource);
    }
  }
}
