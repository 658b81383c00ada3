import { type Static, Type } from "@sinclair/typebox";

// Only the fields mcpbake reads are typed. Entries without a command (remote
// `url` servers, host-specific keys) load with an empty command and are
// copied through untouched by the rewriter.
export const McpServerEntryV1 = Type.Object({
  command: Type.Optional(
    Type.String({ errorMessage: "command must be a string" })
  ),
  args: Type.Optional(
    Type.Array(Type.String(), {
      errorMessage: "args must be an array of strings",
    })
  ),
});
export type McpServerEntryV1 = Static<typeof McpServerEntryV1>;

export const McpServersDocumentV1 = Type.Object({
  mcpServers: Type.Record(Type.String(), Type.Unknown(), {
    errorMessage: "mcpServers must be a mapping of server names to entries",
  }),
});
export type McpServersDocumentV1 = Static<typeof McpServersDocumentV1>;
