import type { IReporter } from './index.js';
import type { IBatchSummary, ISessionOutcome } from '../types/index.js';
import { OUTCOMES } from '../constants/index.js';
import chalk from 'chalk';

export class StdoutReporter implements IReporter {
  async report(outcome: ISessionOutcome): Promise<void> {
    console.log('\n' + chalk.bold.blue('=== SIGNUP SESSION REPORT ==='));
    console.log(`Session ID: ${outcome.sessionId}`);
    console.log(`Address:    ${outcome.identity.address}`);
    console.log(`Duration:   ${outcome.endedAt - outcome.startedAt}ms`);
    console.log('-----------------------------');

    console.log(chalk.bold('Phases:'));
    outcome.history.forEach((result, i) => {
      const color =
        result.outcome === OUTCOMES.SUCCESS ? chalk.green : result.outcome === OUTCOMES.RETRY ? chalk.yellow : chalk.red;
      const reason = result.reason ? ` - ${result.reason}` : '';
      console.log(`  ${i + 1}. ${result.phase}: ${color(result.outcome.toUpperCase())}${reason}`);
    });

    console.log('-----------------------------');
    if (outcome.status === 'done') {
      console.log(chalk.bold.green('FINAL STATUS: DONE'));
      console.log(`Token:      ${outcome.token ?? ''}`);
      if (outcome.persistenceError) {
        console.log(chalk.yellow(`Not saved:  ${outcome.persistenceError}`));
      }
    } else if (outcome.failure) {
      console.log(chalk.bold.red('FINAL STATUS: FAILED'));
      console.log(`Phase:      ${outcome.failure.phase}`);
      console.log(`Kind:       ${outcome.failure.kind}`);
      console.log(`Reason:     ${outcome.failure.reason}`);
      console.log(`Diagnostic: ${outcome.failure.diagnosticRef ?? 'none'}`);
    }
    console.log(chalk.bold.blue('=============================') + '\n');
  }

  async summarize(summary: IBatchSummary): Promise<void> {
    const rate = summary.total > 0 ? (summary.succeeded / summary.total) * 100 : 0;
    const color = summary.succeeded === summary.total ? chalk.green : summary.succeeded > 0 ? chalk.yellow : chalk.red;

    console.log(chalk.bold.blue('=== BATCH SUMMARY ==='));
    console.log(`Succeeded:  ${color(`${summary.succeeded}/${summary.total}`)} (${rate.toFixed(1)}%)`);
    if (summary.outcomes.length < summary.total) {
      console.log(chalk.yellow(`Not run:    ${summary.total - summary.outcomes.length}`));
    }
    console.log(chalk.bold.blue('=====================') + '\n');
  }
}
