/**
 * Static plugin registries: map a manifest's `type` to a factory.
 *
 * Plugins register themselves on module load (see register-plugins.ts);
 * a manifest naming an unregistered type is a plain lookup failure.
 */

import type { z } from "zod";
import { cortexError } from "../errors.js";
import type { ComponentConfig, PluginContext } from "../cortex-types.js";

export type PluginFactory<T> = (config: ComponentConfig, ctx: PluginContext) => T;

export interface PluginDescriptor<T> {
  /** Unique type identifier used in manifests. */
  type: string;
  /** Short description of what the plugin does. */
  description: string;
  factory: PluginFactory<T>;
  /** Default configuration values, overridden by the manifest. */
  defaults?: Record<string, unknown>;
}

export class PluginRegistry<T> {
  private types = new Map<string, PluginDescriptor<T>>();

  constructor(readonly kind: string) {}

  register(descriptor: PluginDescriptor<T>): void {
    if (this.types.has(descriptor.type)) {
      throw new Error(`${this.kind} plugin '${descriptor.type}' is already registered.`);
    }
    this.types.set(descriptor.type, descriptor);
  }

  has(type: string): boolean {
    return this.types.has(type);
  }

  get(type: string): PluginDescriptor<T> | undefined {
    return this.types.get(type);
  }

  list(): PluginDescriptor<T>[] {
    return Array.from(this.types.values());
  }

  /** Remove a registration. Tests use this to clean up stub plugins. */
  unregister(type: string): boolean {
    return this.types.delete(type);
  }

  create(type: string, config: ComponentConfig, ctx: PluginContext): T {
    const descriptor = this.types.get(type);
    if (!descriptor) {
      throw cortexError(
        "plugin_error",
        `${this.kind} plugin '${type}' not found. Available: ${Array.from(this.types.keys()).join(", ")}`,
        { plugin: type, mode: config.mode },
      );
    }
    const merged: ComponentConfig = { ...descriptor.defaults, ...config };
    return descriptor.factory(merged, ctx);
  }
}

/**
 * Parse a plugin's config with its zod schema; failures become plugin
 * errors naming the plugin and the offending fields.
 */
export function parsePluginConfig<S extends z.ZodTypeAny>(
  plugin: string,
  schema: S,
  config: ComponentConfig,
): z.infer<S> {
  const result = schema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw cortexError("plugin_error", `Invalid config for ${plugin}: ${issues}`, {
      plugin,
      mode: config.mode,
    });
  }
  return result.data;
}
