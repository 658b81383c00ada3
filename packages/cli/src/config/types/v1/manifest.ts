import { type Static, Type } from "@sinclair/typebox";

/**
 * The subset of an npm package.json that binary discovery reads
 */
export const PackageManifestV1 = Type.Object({
  name: Type.Optional(Type.String()),
  bin: Type.Optional(
    Type.Union([Type.String(), Type.Record(Type.String(), Type.String())])
  ),
});
export type PackageManifestV1 = Static<typeof PackageManifestV1>;
