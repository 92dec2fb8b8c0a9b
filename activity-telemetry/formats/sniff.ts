import type { SourceFormat } from '../schemas/index.js';
import type { DecodableFormat, FormatExtractor } from '../normalizers/index.js';
import { fitExtractor } from './fit/index.js';
import { tcxExtractor } from './tcx/index.js';

/**
 * Filename suffix for each decodable format
 */
export const FORMAT_SUFFIXES: Record<DecodableFormat, string> = {
  fit: '.fit',
  tcx: '.tcx',
};

const EXTRACTORS: Record<DecodableFormat, FormatExtractor> = {
  fit: fitExtractor,
  tcx: tcxExtractor,
};

/**
 * Select a format by case-insensitive filename suffix
 */
export function sniffFormat(filename: string): SourceFormat {
  const lowered = filename.toLowerCase();

  if (lowered.endsWith(FORMAT_SUFFIXES.fit)) {
    return 'fit';
  }
  if (lowered.endsWith(FORMAT_SUFFIXES.tcx)) {
    return 'tcx';
  }
  return 'unsupported';
}

/**
 * Extractor for a format, or null when the format is unsupported
 */
export function getExtractor(format: SourceFormat): FormatExtractor | null {
  return format === 'unsupported' ? null : EXTRACTORS[format];
}
