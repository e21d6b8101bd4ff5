import chalk from 'chalk';
import { loadConfig, createLogger } from '@sheetreel/shared';
import { buildPipeline } from './pipeline.js';
import { parseLimit, renderOutcomeTable, renderQueueTable, renderSummaryTable } from './report.js';

const print = {
  header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
  success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
  info: (text: string) => console.log(chalk.blue(`  ℹ ${text}`)),
  warn: (text: string) => console.log(chalk.yellow(`  ⚠ ${text}`)),
  error: (text: string) => console.error(chalk.red(`  ✗ ${text}`)),
  dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
};

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === 'help' || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  if (!['run', 'status', 'clean'].includes(command)) {
    print.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  try {
    const config = loadConfig();
    const logger = createLogger('sheetreel', config.logLevel);
    const pipeline = buildPipeline(config, logger);

    switch (command) {
      case 'run': {
        const limit = parseLimit(getFlag(args, '--limit'));
        print.header('Processing queue');
        if (limit !== undefined) print.dim(`At most ${limit} row(s)`);

        const summary = await pipeline.runner.run({ limit });
        if (summary.outcomes.length === 0) {
          print.info('No pending rows');
        } else {
          console.log(renderOutcomeTable(summary));
        }
        console.log(renderSummaryTable(summary));
        if (summary.errored > 0 || summary.uploadFailed > 0) {
          print.warn('Some rows did not complete; see the Status column');
        } else if (summary.completed > 0) {
          print.success(`${summary.completed} video(s) published`);
        }
        return 0;
      }

      case 'status': {
        print.header('Queue');
        const rows = await pipeline.store.listRows();
        if (rows.length === 0) {
          print.info('The queue sheet has no rows');
        } else {
          console.log(renderQueueTable(rows));
        }
        return 0;
      }

      case 'clean': {
        print.header('Working directory');
        const removed = await pipeline.workspace.clean();
        if (removed.length === 0) {
          print.info(`Nothing to clean in ${pipeline.workspace.layout.rootDir}`);
        } else {
          for (const path of removed) print.dim(path);
          print.success(`Removed ${removed.length} item(s)`);
        }
        return 0;
      }
    }
  } catch (err) {
    print.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
  return 1;
}

function printHelp() {
  console.log(`
  sheetreel — turn spreadsheet rows into narrated slideshow videos

  Usage:
    npm run sheetreel -- <command> [options]

  Commands:
    run                        Process every pending row once
      --limit <n>              Stop after n rows
    status                     Show every queue row with its status and link
    clean                      Delete working files left by an interrupted run
    help                       Show this message

  Configuration is read from the environment and .env (see .env.example).
  `);
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
