export { runExportCommand, runConvertCommand, createEspnProvider } from './projection.commands';
export { ProjectionExportService, convertSavedProjections } from './projection-export.service';
export { extractProjectionRows, resolveProjectedPoints, resolveAppliedTotal } from './projection-extractor';
export { formatProjectionCsv } from './projections-csv';
export { EspnApiClient } from '../../integrations/espn/espn-api-client';
export type { ProjectionRow, ExportSummary } from './projections.model';
