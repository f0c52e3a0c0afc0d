import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { convertFile, convertText, requireFormat } from '../convert/convert.js';
import { loadMappingTable, mappingPathFor } from '../mapping/load.js';
import { formatDiagnostic } from '../records/diagnostics.js';
import { FORMAT_ALIASES, SOURCE_FORMATS, type Diagnostic } from '../records/types.js';
import type { ConvertToolArgs, FormatsToolArgs, PreviewToolArgs } from './schemas.js';

function describeSkipped(diagnostics: Diagnostic[]): string {
  if (diagnostics.length === 0) return '';
  return `\nSkipped:\n${diagnostics.map((d) => `- ${formatDiagnostic(d)}`).join('\n')}`;
}

export async function handleConvert(args: ConvertToolArgs): Promise<CallToolResult> {
  const summary = await convertFile({
    format: args.format,
    inputPath: args.inputPath,
    outputPath: args.outputPath,
    mappingDir: args.mappingDir,
    inputEncoding: args.inputEncoding,
    outputEncoding: args.outputEncoding,
  });

  return {
    content: [
      {
        type: 'text' as const,
        text:
          `Converted ${summary.written} of ${summary.recordsRead} records to ${summary.outputPath}.` +
          describeSkipped(summary.diagnostics),
      },
    ],
    structuredContent: { ...summary },
  };
}

export async function handlePreview(args: PreviewToolArgs): Promise<CallToolResult> {
  const format = requireFormat(args.format);
  const table = await loadMappingTable(format, { mappingDir: args.mappingDir });
  const { bibtex, report } = convertText(args.text, { table });

  return {
    content: [{ type: 'text' as const, text: (bibtex || '(no entries)') + describeSkipped(report.diagnostics) }],
    structuredContent: { ...report, bibtex },
  };
}

export async function handleFormats(args: FormatsToolArgs): Promise<CallToolResult> {
  const formats = SOURCE_FORMATS.map((format) => ({
    format,
    aliases: Object.entries(FORMAT_ALIASES)
      .filter(([, target]) => target === format)
      .map(([alias]) => alias),
    mappingPath: mappingPathFor(format, args.mappingDir),
  }));

  return {
    content: [
      {
        type: 'text' as const,
        text: formats
          .map((f) => `${f.format}${f.aliases.length > 0 ? ` (${f.aliases.join(', ')})` : ''}: ${f.mappingPath}`)
          .join('\n'),
      },
    ],
    structuredContent: { formats },
  };
}
