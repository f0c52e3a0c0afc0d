#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ConvertSchema, PreviewSchema, FormatsSchema } from "./mcp/schemas.js";
import type { ConvertToolArgs, PreviewToolArgs, FormatsToolArgs } from "./mcp/schemas.js";
import { handleConvert, handlePreview, handleFormats } from "./mcp/tools.js";
import { formatError } from "./convert/errors.js";
import { isDebug } from "./config.js";

function safeTool<TArgs>(name: string, fn: (args: TArgs) => Promise<CallToolResult>) {
  return async (args: TArgs): Promise<CallToolResult> => {
    try {
      if (isDebug()) {
        console.error(`[tool:${name}]`, JSON.stringify(args));
      }
      return await fn(args);
    } catch (err) {
      const msg = formatError(err);
      console.error(msg);
      return {
        isError: true,
        content: [{ type: 'text' as const, text: msg }],
      };
    }
  };
}

const server = new McpServer({
  name: "bibconvert",
  version: "1.0.0",
});

function registerTools(): void {
  server.tool(
    "bib_convert",
    "Convert a PubMed RIS, Scopus CSV or IEEE Xplore CSV export file into a BibTeX file.",
    ConvertSchema,
    safeTool("bib_convert", (args: ConvertToolArgs) => handleConvert(args))
  );

  server.tool(
    "bib_preview",
    "Convert export text held in memory and return the BibTeX without writing a file.",
    PreviewSchema,
    safeTool("bib_preview", (args: PreviewToolArgs) => handlePreview(args))
  );

  server.tool(
    "bib_formats",
    "List supported source formats, their aliases and mapping files.",
    FormatsSchema,
    safeTool("bib_formats", (args: FormatsToolArgs) => handleFormats(args))
  );
}

async function main() {
  registerTools();

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("bibconvert MCP server running on stdio");

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
