#!/usr/bin/env node
/**
 * CLI entry point for the skill catalog.
 * Parses command-line arguments with meow and dispatches to the skill handler.
 */

import meow from 'meow';
import { createCliContext } from './cli/cli-context.js';
import { skillHandler } from './cli/commands/skills.js';
import { getUserFriendlyMessage } from './errors/index.js';

const cli = meow(
  `
  Usage
    $ skills <command> [options]

  Commands
    list                   List available skills
    info <name>            Show skill details
    show <name>            Print the prompt a skill loads
    catalog [budget]       Print the <available_skills> catalog
    validate <path>        Validate a skill directory or SKILL.md file

  Options
    --verbose              Show discovery details on stderr
    --version              Show version

  Examples
    $ skills list
    $ skills catalog 4000
    $ skills validate .claude/skills/my-workflow
`,
  {
    flags: {
      verbose: { type: 'boolean', alias: 'v', default: false },
    },
  }
);

async function main(): Promise<void> {
  const context = await createCliContext({ verbose: cli.flags.verbose });
  const result = await skillHandler(cli.input.join(' '), context);
  process.exitCode = result.success ? 0 : 1;
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n${getUserFriendlyMessage('UNKNOWN')}\n`);
  process.exitCode = 1;
});
