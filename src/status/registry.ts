import type { StructuredLogger } from "../logger.js";
import { BroadcastChannel, type BroadcastChannelOptions } from "./channel.js";
import { formatResourceKey, resourceKey, resourceKeyId, type ResourceKey } from "./resourceKey.js";

export interface ChannelRegistryOptions {
  /** Options applied to every channel the registry creates. */
  channel?: Omit<BroadcastChannelOptions, "initial">;
  logger?: Pick<StructuredLogger, "debug">;
}

/**
 * Owns one {@link BroadcastChannel} per resource key. Channels are created on
 * first reference and never evicted: the managed resource set is small and
 * fixed for the lifetime of the process. Lookup and insertion happen in one
 * synchronous step, so two callers can never end up with distinct channels
 * for the same key.
 */
export class ChannelRegistry {
  private readonly channels = new Map<string, BroadcastChannel>();

  constructor(private readonly options: ChannelRegistryOptions = {}) {}

  get size(): number {
    return this.channels.size;
  }

  getOrCreate(key: ResourceKey): BroadcastChannel {
    const id = resourceKeyId(key);
    const existing = this.channels.get(id);
    if (existing) {
      return existing;
    }
    const channel = new BroadcastChannel(resourceKey(key.namespace, key.name), this.options.channel);
    this.channels.set(id, channel);
    this.options.logger?.debug("status_channel_created", { resource: formatResourceKey(key) });
    return channel;
  }

  /** Returns the channel for {@link key} without creating it. */
  peek(key: ResourceKey): BroadcastChannel | undefined {
    return this.channels.get(resourceKeyId(key));
  }
}
