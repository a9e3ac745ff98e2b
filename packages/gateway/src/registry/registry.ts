import type { BackendAdapter, ModelId } from '../types/index.js';
import { ConfigurationError, UnknownModelError } from '../types/index.js';
import { DEFAULT_ADAPTER_FACTORIES, type AdapterFactories } from '../providers/index.js';
import type { GatewayConfig } from '../config/config.js';

/**
 * Read-only mapping from model identifier to adapter, built once at startup
 * and shared by every dispatch.
 */
export class ModelRegistry {
  private readonly adapters: ReadonlyMap<ModelId, BackendAdapter>;
  private readonly ids: ReadonlyArray<ModelId>;

  constructor(adapters: Iterable<BackendAdapter>) {
    const byId = new Map<ModelId, BackendAdapter>();
    for (const adapter of adapters) {
      if (byId.has(adapter.id)) {
        throw new ConfigurationError(`model '${adapter.id}' is configured more than once`);
      }
      byId.set(adapter.id, adapter);
    }

    this.adapters = byId;
    this.ids = Object.freeze(Array.from(byId.keys()));
  }

  static fromConfig(
    config: GatewayConfig,
    factories: AdapterFactories = DEFAULT_ADAPTER_FACTORIES,
  ): ModelRegistry {
    return new ModelRegistry(
      config.models.map((backend) => {
        const factory = factories[backend.vendor];
        return factory(backend);
      }),
    );
  }

  resolve(id: ModelId): BackendAdapter {
    const adapter = this.adapters.get(id);
    if (!adapter) {
      throw new UnknownModelError(id);
    }
    return adapter;
  }

  has(id: ModelId): boolean {
    return this.adapters.has(id);
  }

  /** Identifiers in insertion order. */
  list(): ReadonlyArray<ModelId> {
    return this.ids;
  }

  get size(): number {
    return this.ids.length;
  }
}
