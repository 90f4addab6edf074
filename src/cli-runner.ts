import { readFileSync } from 'fs';
import { IndexedArrayUtils } from './array';
import { consoleLogger } from './common';
import type { Logger } from './common';
import { SourceUnreadableError } from './errors';
import { exportModel } from './exporter';
import { describeArray } from './model';

export const USAGE = [
  'Usage: obj2ia <file.obj> [--out <dir>] [--zip]',
  '       obj2ia inspect <file.ia8|file.ia3>',
].join('\n');

const BANNER = 'OBJ2IA | OBJ to indexed-array converter\n=======================================\n';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'export'; objPath: string; outputDir?: string; bundle: boolean }
  | { kind: 'inspect'; artifactPath: string };

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(args: string[]): CliCommand {
  if (args.length === 0) {
    throw new Error(`Too few arguments\n${USAGE}`);
  }
  if (args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }

  if (args[0] === 'inspect') {
    if (args.length !== 2) {
      throw new Error(`inspect takes exactly one file\n${USAGE}`);
    }
    return { kind: 'inspect', artifactPath: args[1] };
  }

  let objPath: string | undefined;
  let outputDir: string | undefined;
  let bundle = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--zip') {
      bundle = true;
    } else if (arg === '--out') {
      outputDir = args[++i];
      if (outputDir === undefined || outputDir.startsWith('-')) {
        throw new Error(`--out needs a directory\n${USAGE}`);
      }
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option "${arg}"\n${USAGE}`);
    } else if (objPath === undefined) {
      objPath = arg;
    } else {
      throw new Error(`Unexpected argument "${arg}"\n${USAGE}`);
    }
  }

  if (objPath === undefined) {
    throw new Error(`Missing OBJ file\n${USAGE}`);
  }
  return { kind: 'export', objPath, outputDir, bundle };
}

/**
 * Run the command line and return the process exit code.
 * Every failure is reported as `Error: <message>` and yields 1.
 */
export async function runCli(args: string[], logger: Logger = consoleLogger): Promise<number> {
  try {
    const command = parseArgs(args);

    switch (command.kind) {
      case 'help':
        logger.info(USAGE);
        break;
      case 'inspect': {
        const array = IndexedArrayUtils.decode(readArtifact(command.artifactPath));
        logger.info(`"${command.artifactPath}": IA${array.arity}`);
        logger.info(describeArray(array));
        break;
      }
      case 'export':
        logger.info(BANNER);
        await exportModel(command.objPath, {
          outputDir: command.outputDir,
          bundle: command.bundle,
          logger,
        });
        break;
    }
    return 0;
  } catch (e) {
    if (e instanceof Error) {
      logger.error(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

function readArtifact(file: string): Uint8Array {
  try {
    return readFileSync(file);
  } catch (error) {
    throw new SourceUnreadableError(file, error);
  }
}
