#!/usr/bin/env node
/**
 * Download ESPN season projections and export them as JSON + CSV
 * Usage: npx ts-node scripts/export-espn-projections.ts --season=2025 --swid=... --espn-s2=...
 */
import 'dotenv/config';
import { runExportCommand } from '../src/modules/projections';

runExportCommand(process.argv.slice(2)).then((code) => {
  process.exit(code);
});
