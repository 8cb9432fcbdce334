/**
 * Export Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { ExportService, type DeckExport } from '@/core/export';
 * ```
 */

export { ExportService } from './export-service';

export {
  DECK_EXPORT_VERSION,
  reviewRecordSchema,
  exportedCardSchema,
  deckExportSchema,
  type ExportedCard,
  type DeckExport,
  type ImportOptions,
  type ImportResult,
} from './types';
