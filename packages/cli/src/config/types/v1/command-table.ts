import { type Static, Type } from "@sinclair/typebox";

export const EcosystemV1 = Type.Union([
  Type.Literal("npm"),
  Type.Literal("pip"),
  Type.Literal("uv"),
]);
export type EcosystemV1 = Static<typeof EcosystemV1>;

/**
 * Static command -> package table: keys are literal `command` values
 */
export const CommandTableV1 = Type.Record(
  Type.String(),
  Type.Object({
    ecosystem: EcosystemV1,
    identifier: Type.String({ minLength: 1 }),
  })
);
export type CommandTableV1 = Static<typeof CommandTableV1>;
