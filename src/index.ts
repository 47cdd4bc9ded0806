#!/usr/bin/env node
import { formatOutcome, runAnalogy } from '../ml/lib/analogy';
import { IOError, ParseError, UsageError } from '../ml/lib/errors';
import { ParsedArguments, parseArguments, USAGE } from '../ml/lib/options';
import { warnToConsole } from '../ml/lib/vector-store';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Runs the command line tool and resolves with the exit status.
 * Results go to stdout, warnings and errors to stderr.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let parsed: ParsedArguments;
  try {
    parsed = parseArguments(argv, env);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw err;
  }
  if (parsed.help) {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  try {
    const outcome = await runAnalogy(parsed, warnToConsole);
    formatOutcome(outcome).forEach(line => console.log(line));
    return EXIT_SUCCESS;
  } catch (err) {
    if (err instanceof IOError || err instanceof ParseError) {
      console.error(`Error: ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => process.exitCode = code)
    .catch(err => {
      console.error(err);
      process.exitCode = EXIT_FAILURE;
    });
}
