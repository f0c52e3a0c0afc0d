import { z } from 'zod';

export const ConvertSchema = {
  format: z.string().describe('Source format: ris, scopus-csv, ieee-csv (aliases: pubmed, scopus, ieee)'),
  inputPath: z.string().describe('Path to the export file'),
  outputPath: z.string().describe('Path to the BibTeX file to write'),
  mappingDir: z.string().optional().describe('Directory holding <format>.yaml mapping files'),
  inputEncoding: z.string().optional().default('utf-8').describe('Character encoding of the input (default: utf-8)'),
  outputEncoding: z.string().optional().default('utf-8').describe('Character encoding of the output (default: utf-8)'),
};

export const PreviewSchema = {
  format: z.string().describe('Source format: ris, scopus-csv, ieee-csv (aliases: pubmed, scopus, ieee)'),
  text: z.string().describe('Export contents to convert'),
  mappingDir: z.string().optional().describe('Directory holding <format>.yaml mapping files'),
};

export const FormatsSchema = {
  mappingDir: z.string().optional().describe('Directory holding <format>.yaml mapping files'),
};

const ConvertArgs = z.object(ConvertSchema);
const PreviewArgs = z.object(PreviewSchema);
const FormatsArgs = z.object(FormatsSchema);

export type ConvertToolArgs = z.infer<typeof ConvertArgs>;
export type PreviewToolArgs = z.infer<typeof PreviewArgs>;
export type FormatsToolArgs = z.infer<typeof FormatsArgs>;
