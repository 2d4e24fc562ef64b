import { debug } from '../shared/debug.js';

/**
 * The set of enabled layer names.
 *
 * One instance is shared by reference between the validator and whoever
 * toggles layers. There is no snapshot isolation: a call in flight sees
 * whatever the set holds when it reads it. Callers that need isolation
 * create separate registries.
 */
export class LayerRegistry {
  private readonly enabled = new Set<string>();

  constructor(initial: readonly string[] = []) {
    for (const layer of initial) {
      this.enabled.add(layer);
    }
  }

  enable(layer: string): void {
    if (this.enabled.has(layer)) return;
    this.enabled.add(layer);
    debug('layers', 'Layer enabled', { layer });
  }

  disable(layer: string): void {
    if (this.enabled.delete(layer)) {
      debug('layers', 'Layer disabled', { layer });
    }
  }

  has(layer: string): boolean {
    return this.enabled.has(layer);
  }

  /** A copy; mutating it does not touch the registry. */
  active(): Set<string> {
    return new Set(this.enabled);
  }

  clear(): void {
    this.enabled.clear();
    debug('layers', 'All layers disabled');
  }
}
