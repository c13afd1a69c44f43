import { Command } from 'commander';
import { existsSync } from 'fs';
import path from 'path';
import { stringify } from 'yaml';
import { loadForm, saveForm, type Form, type FormInput } from './config.js';
import { isCancelled } from './errors.js';
import { buildWidget, runForm } from './form.js';
import { createLogger } from './logger.js';
import { withTerminal } from './terminal/session.js';
import { Tracker } from './tracker.js';

export const SAMPLE_FORM: FormInput = {
  settings: { itemsPerPage: 8 },
  questions: [
    { id: 'name', kind: 'text', message: "What's your name?", placeholder: 'Jane Doe' },
    { id: 'pets', kind: 'number', type: 'u8', message: 'How many pets do you have?', default: 0 },
    { id: 'species', kind: 'multi-select', message: 'Which ones?', choices: ['Dog', 'Cat', 'Fish'] },
    { id: 'newsletter', kind: 'confirm', message: 'Subscribe to the newsletter?', default: true },
  ],
};

/** One line per question: `id | kind | message`. Throws if a question cannot be built. */
export function describeForm(form: Form): string[] {
  return form.questions.map((q) => {
    buildWidget(q, form.settings);
    return `  ${q.id} | ${q.kind} | ${q.message}`;
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function fail(err: unknown): never {
  if (isCancelled(err)) {
    console.error('Cancelled');
    process.exit(130);
  }
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('keyprompt')
    .description('Ask interactive terminal questions described in a YAML form')
    .version('0.1.0');

  program
    .command('ask <file>')
    .description('Ask every question of the form in the terminal and print the answers as YAML')
    .option('--json', 'Print answers as JSON instead of YAML')
    .option('--log <file>', 'Append a timestamped debug log to <file>')
    .option('--record <dir>', 'Record a JSONL transcript of keys and answers under <dir>')
    .addHelpText('after', '\nExamples:\n  $ keyprompt ask survey.yaml\n  $ keyprompt ask survey.yaml --json --record logs')
    .action(async (file: string, options: { json?: boolean; log?: string; record?: string }) => {
      try {
        const form = loadForm(file);
        const log = options.log ? createLogger(options.log) : undefined;
        const tracker = options.record ? new Tracker(path.basename(file, path.extname(file)), options.record) : undefined;
        const answers = await withTerminal(
          (io) => runForm(form, { ...io, log, tracker }),
          { timeoutMs: form.settings.timeoutMs },
        );
        console.log(options.json ? JSON.stringify(answers, null, 2) : stringify(answers).trimEnd());
      } catch (err: unknown) {
        fail(err);
      }
    });

  program
    .command('check <file>')
    .description('Validate a form file and list its questions (id, kind, message)')
    .action((file: string) => {
      try {
        const form = loadForm(file);
        console.log(`✓ ${file}: ${form.questions.length} questions`);
        for (const row of describeForm(form)) console.log(row);
      } catch (err: unknown) {
        fail(err);
      }
    });

  program
    .command('init <file>')
    .description('Write a sample form to <file>')
    .option('-f, --force', 'Overwrite an existing file')
    .addHelpText('after', '\nExamples:\n  $ keyprompt init survey.yaml')
    .action((file: string, options: { force?: boolean }) => {
      if (existsSync(file) && !options.force) {
        console.error(`${file} already exists. Run with --force to overwrite.`);
        process.exit(1);
      }
      saveForm(SAMPLE_FORM, file);
      console.log(`✓ Sample form written to ${file}`);
    });

  return program;
}
