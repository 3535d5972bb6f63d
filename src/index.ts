import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { solveSchedule } from './app/solveSchedule';
import { describeError } from './errors';
import { emitDeliveriesCsv, emitMetricsCsv } from './io/emitCsv';
import { emitHtml } from './io/emitHtml';
import { emitSvg } from './io/emitSvg';
import { generateCustomers, toPlanDocument } from './io/generate';
import type { ProgressFn } from './planner';
import { formatTimestampToken } from './time';
import type { TieBreak } from './types';

interface SolveCliOptions {
  plan: string;
  customersCsv?: string;
  capacity?: number;
  speed?: number;
  dispatch?: number;
  reload?: number;
  workday?: number;
  fleet?: number;
  maxDays?: number;
  tieBreak?: TieBreak;
  verbose?: boolean;
  progress?: boolean;
  markdown?: boolean;
  out?: string;
  csv?: string;
  svg?: string | boolean;
  html?: string | boolean;
}

interface GenerateCliOptions {
  count: number;
  seed?: number;
  extent?: number;
  minWeight?: number;
  maxWeight?: number;
  out?: string;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return n;
}

function parseTieBreak(value: string): TieBreak {
  if (value === 'input' || value === 'id') return value;
  throw new InvalidArgumentError(`Expected "input" or "id": ${value}`);
}

function progressLogger(): ProgressFn {
  return (day, s) => {
    console.log(
      `progress day ${day}: served=${s.servedToday} total=${s.servedTotal} remaining=${s.remaining} distance=${s.distanceKm.toFixed(
        2,
      )}`,
    );
  };
}

function writeOutput(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
  console.log(`Wrote ${path}`);
}

export const program = new Command();

program
  .name('depot-days')
  .description('Multi-day delivery scheduling from a single depot')
  .version('0.1.0')
  .showHelpAfterError();

program
  .command('solve', { isDefault: true })
  .requiredOption('--plan <file>', 'Path to plan JSON file')
  .option('--customers-csv <file>', 'Append customers from a CSV file (id,x,y,weight[,name])')
  .option('--capacity <kg>', 'Vehicle capacity in kg', parseNumber)
  .option('--speed <kmh>', 'Average speed in km/h', parseNumber)
  .option('--dispatch <min>', 'Fixed unloading minutes per customer', parseNumber)
  .option('--reload <min>', 'Minutes spent reloading at the depot', parseNumber)
  .option('--workday <min>', 'Workday length in minutes', parseNumber)
  .option('--fleet <count>', 'Number of vehicles', parseInteger)
  .option('--max-days <count>', 'Give up after this many days', parseInteger)
  .option('--tie-break <mode>', 'Equal-cost order: input or id', parseTieBreak)
  .option('--verbose', 'Print every delivery and reload')
  .option('--progress', 'Print a snapshot after each day')
  .option('--markdown', 'Print a Markdown summary')
  .option('--out <file>', 'Write schedule JSON to this path (overwrite)')
  .option('--csv <prefix>', 'Write <prefix>-deliveries.csv and <prefix>-metrics.csv')
  .option('--svg [file]', 'Write SVG route plot to this path (or stdout)')
  .option('--html [file]', 'Write HTML report to this path (or stdout)')
  .action((opts: SolveCliOptions) => {
    try {
      const result = solveSchedule({
        planPath: opts.plan,
        customersCsvPath: opts.customersCsv,
        overrides: {
          capacityKg: opts.capacity,
          speedKmh: opts.speed,
          dispatchMin: opts.dispatch,
          reloadMin: opts.reload,
          workdayMin: opts.workday,
          fleetSize: opts.fleet,
          maxDays: opts.maxDays,
          tieBreak: opts.tieBreak,
        },
        verbose: opts.verbose,
        progress: opts.progress ? progressLogger() : undefined,
        markdown: opts.markdown,
      });
      const { plan, config, customers, runTimestamp } = result;
      const tsToken = formatTimestampToken(runTimestamp);
      const tokenize = (s: string): string =>
        s.replace(/\$\{(runId|timestamp)\}/g, (_, k: string) =>
          k === 'runId' ? result.runId ?? '' : tsToken,
        );

      if (opts.out) {
        writeOutput(tokenize(opts.out), result.json);
      }

      if (opts.csv) {
        const prefix = tokenize(opts.csv);
        const names = new Map<string, string>();
        for (const c of customers) {
          if (c.name) names.set(c.id, c.name);
        }
        writeOutput(
          `${prefix}-deliveries.csv`,
          emitDeliveriesCsv(plan.deliveries, runTimestamp, {
            dayStart: config.dayStart,
            names,
          }),
        );
        writeOutput(`${prefix}-metrics.csv`, emitMetricsCsv(plan.metrics, runTimestamp));
      }

      const svg =
        opts.svg !== undefined || opts.html !== undefined
          ? emitSvg(plan.days, customers, config.depot)
          : undefined;

      if (opts.svg !== undefined && svg !== undefined) {
        if (typeof opts.svg === 'string') {
          writeOutput(tokenize(opts.svg), svg);
        } else {
          console.log(svg);
        }
      }

      if (opts.html !== undefined) {
        const html = emitHtml(plan, runTimestamp, {
          svg,
          dayStart: config.dayStart,
          runNote: result.runNote,
          customers,
        });
        if (typeof opts.html === 'string') {
          writeOutput(tokenize(opts.html), html);
        } else {
          console.log(html);
        }
      }

      if (result.markdown) {
        console.log(result.markdown);
      }

      console.log(result.json);
    } catch (err) {
      console.error(describeError(err));
      process.exitCode = 1;
    }
  });

program
  .command('generate')
  .description('Write a synthetic plan document')
  .requiredOption('--count <n>', 'Number of customers', parseInteger)
  .option('--seed <seed>', 'Random seed', parseNumber)
  .option('--extent <km>', 'Half-width of the area around the depot in km', parseNumber)
  .option('--min-weight <kg>', 'Lightest customer in kg', parseNumber)
  .option('--max-weight <kg>', 'Heaviest customer in kg', parseNumber)
  .option('--out <file>', 'Write plan JSON to this path (or stdout)')
  .action((opts: GenerateCliOptions) => {
    try {
      const customers = generateCustomers({
        count: opts.count,
        seed: opts.seed,
        extentKm: opts.extent,
        minWeightKg: opts.minWeight,
        maxWeightKg: opts.maxWeight,
      });
      const json = JSON.stringify(toPlanDocument(customers), null, 2);
      if (opts.out) {
        writeOutput(opts.out, json);
      } else {
        console.log(json);
      }
    } catch (err) {
      console.error(describeError(err));
      process.exitCode = 1;
    }
  });

export function run(argv: readonly string[] = process.argv): Command {
  program.parse([...argv]);
  return program;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run();
}
