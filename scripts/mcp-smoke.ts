import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import fs from "fs";
import path from "path";
import os from "os";

const SAMPLE_RIS = ["TY  - JOUR", "AU  - Doe, Jane", "TI  - A Study", "PY  - 2021", "ER  - ", ""].join("\n");

async function runSmokeTest() {
  console.log("Starting MCP Smoke Test...");

  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "bibconvert-smoke-"));
  const inputPath = path.join(tempDir, "sample.ris");
  const outputPath = path.join(tempDir, "sample.bib");
  fs.writeFileSync(inputPath, SAMPLE_RIS);

  console.log(`Using temp dir: ${tempDir}`);

  const serverPath = path.resolve("dist/index.js");

  if (!fs.existsSync(serverPath)) {
    console.error(`Server not found at ${serverPath}. Please run 'npm run build' first.`);
    process.exit(1);
  }

  const transport = new StdioClientTransport({
    command: "node",
    args: [serverPath],
  });

  const client = new Client(
    {
      name: "smoke-test-client",
      version: "1.0.0",
    },
    {
      capabilities: {},
    }
  );

  try {
    await client.connect(transport);
    console.log("Connected to MCP server.");

    const { tools } = await client.listTools();
    const toolNames = tools.map((t) => t.name);
    console.log("Available tools:", toolNames);

    for (const tool of ["bib_convert", "bib_preview", "bib_formats"]) {
      if (!toolNames.includes(tool)) {
        throw new Error(`Missing tool: ${tool}`);
      }
    }
    console.log("✅ All required tools are present.");

    console.log(`Calling bib_convert on ${inputPath}...`);
    const convertResult = await client.callTool({
      name: "bib_convert",
      arguments: { format: "ris", inputPath, outputPath },
    });
    if (convertResult.isError) {
      throw new Error(`bib_convert failed: ${JSON.stringify(convertResult)}`);
    }
    const bibtex = fs.readFileSync(outputPath, "utf-8");
    if (!bibtex.startsWith("@article{doe2021,")) {
      throw new Error(`Unexpected BibTeX output:\n${bibtex}`);
    }
    console.log("✅ bib_convert succeeded.");

    console.log("MCP Smoke Test PASSED! 🚀");
    await client.close();
    process.exitCode = 0;
  } catch (error) {
    console.error("MCP Smoke Test FAILED! ❌");
    console.error(error);
    process.exitCode = 1;
  } finally {
    try {
      fs.rmSync(tempDir, { recursive: true, force: true });
    } catch (e) {
      console.error("Failed to cleanup temp path:", e);
    }
  }
}

void runSmokeTest();
