import { Command } from 'commander';
import { convertFile } from './convert/convert.js';
import { formatDiagnostic } from './records/diagnostics.js';
import { FORMAT_ALIASES, SOURCE_FORMATS } from './records/types.js';

interface ConvertCliOptions {
  mappings?: string;
  encoding: string;
  outputEncoding: string;
  quiet?: boolean;
}

export function buildProgram(): Command {
  const formats = [...SOURCE_FORMATS, ...Object.keys(FORMAT_ALIASES)].join(', ');

  return new Command('bibconvert')
    .description('Convert PubMed RIS, Scopus CSV and IEEE Xplore CSV exports into a BibTeX file')
    .version('1.0.0')
    .argument('<format>', `Format of the input file (${formats})`)
    .argument('<input>', 'Path to the export file')
    .argument('<output>', 'Path to the BibTeX file to write')
    .option('-m, --mappings <dir>', 'Directory holding the <format>.yaml mapping files')
    .option('-e, --encoding <encoding>', 'Character encoding of the input file', 'utf-8')
    .option('-o, --output-encoding <encoding>', 'Character encoding of the BibTeX file', 'utf-8')
    .option('-q, --quiet', 'Do not print skipped records')
    .action(async (format: string, input: string, output: string, options: ConvertCliOptions) => {
      const summary = await convertFile({
        format,
        inputPath: input,
        outputPath: output,
        mappingDir: options.mappings,
        inputEncoding: options.encoding,
        outputEncoding: options.outputEncoding,
        onDiagnostic: options.quiet
          ? undefined
          : (diagnostic) => console.error(`[skip] ${formatDiagnostic(diagnostic)}`),
      });

      console.log(
        `Converted ${summary.written} of ${summary.recordsRead} records to ${summary.outputPath} (${summary.skipped} skipped)`
      );
    });
}
