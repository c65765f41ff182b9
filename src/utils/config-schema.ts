/**
 * TypeBox schema for sshdeck configuration
 *
 * The merged configuration (defaults + config.yaml + environment) must
 * satisfy this schema before anything touches the key directory.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const KeyTypeSchema = Type.Union([
  Type.Literal('rsa'),
  Type.Literal('ed25519'),
  Type.Literal('ecdsa'),
  Type.Literal('dsa')
]);

export const ConfigSchema = Type.Object({
  keys: Type.Object({
    directory: Type.String({ minLength: 1 }),
    trashDir: Type.String({ minLength: 1 }),
    ignore: Type.Array(Type.String())
  }, { additionalProperties: false }),
  agent: Type.Object({
    socketPath: Type.Optional(Type.String({ minLength: 1 }))
  }, { additionalProperties: false }),
  log: Type.Object({
    persist: Type.Boolean(),
    path: Type.String({ minLength: 1 }),
    // 0 keeps every entry for the session
    maxEntries: Type.Integer({ minimum: 0 }),
    rawOutputLimit: Type.Integer({ minimum: 64 })
  }, { additionalProperties: false }),
  queue: Type.Object({
    maxPending: Type.Integer({ minimum: 1, maximum: 1024 })
  }, { additionalProperties: false }),
  exec: Type.Object({
    timeoutMs: Type.Integer({ minimum: 1000 })
  }, { additionalProperties: false }),
  defaults: Type.Object({
    keyType: KeyTypeSchema,
    rsaBits: Type.Integer({ minimum: 2048, maximum: 16384 })
  }, { additionalProperties: false })
});

export type ConfigShape = Static<typeof ConfigSchema>;

export function isConfigShape(value: unknown): value is ConfigShape {
  return Value.Check(ConfigSchema, value);
}

/**
 * Returns one line per problem, empty when the value is a valid config.
 */
export function validateConfigShape(value: unknown): string[] {
  if (isConfigShape(value)) {
    return [];
  }
  return [...Value.Errors(ConfigSchema, value)].map(
    error => `${error.path || '/'}: ${error.message}`
  );
}
