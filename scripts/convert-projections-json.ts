#!/usr/bin/env node
/**
 * Flatten a previously saved projections payload into CSV
 * Usage: npx ts-node scripts/convert-projections-json.ts <input.json> <output.csv> [season]
 */
import { runConvertCommand } from '../src/modules/projections';

runConvertCommand(process.argv.slice(2)).then((code) => {
  process.exit(code);
});
