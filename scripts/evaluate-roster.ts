import { readFileSync } from 'fs';
import { resolve } from 'path';
import { loadConfig } from '../src/config';
import { RosterError } from '../src/errors';
import { createRosterAnalyzerFromConfig } from '../src/pipeline';
import { formatAnalysis } from '../src/report-format';

function printUsageAndExit(): never {
  // eslint-disable-next-line no-console
  console.error('Usage: npx tsx scripts/evaluate-roster.ts <roster.ros|roster.rosz|roster.json> [--json]');
  process.exit(1);
}

function main() {
  const args = process.argv.slice(2);
  const asJson = args.includes('--json');
  const [inputPathArg] = args.filter(arg => !arg.startsWith('--'));
  if (!inputPathArg) {
    printUsageAndExit();
  }

  try {
    const analyzer = createRosterAnalyzerFromConfig(loadConfig());
    const analysis = analyzer.analyze(readFileSync(resolve(inputPathArg)));

    // eslint-disable-next-line no-console
    console.log(asJson
      ? JSON.stringify(analysis.report, null, 2)
      : formatAnalysis(analysis, analyzer.reference.repository));
  } catch (error) {
    if (error instanceof RosterError) {
      // eslint-disable-next-line no-console
      console.error(`${error.name}: ${error.message}`);
      process.exit(2);
    }
    throw error;
  }
}

main();
