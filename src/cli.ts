/**
 * Command line parsing
 */

import { SOURCE_TYPES, type SourceType } from './types/index.js';
import { ConfigurationError } from './errors.js';

export interface CliOptions {
  mode: 'service' | 'run' | 'source' | 'seed' | 'status';
  type?: SourceType;
  sourceId?: number;
  force: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const valueOf = (name: string): string | undefined =>
    args.find((a) => a.startsWith(`--${name}=`))?.slice(name.length + 3);

  const typeArg = valueOf('type');
  let type: SourceType | undefined;
  if (typeArg !== undefined) {
    type = SOURCE_TYPES.find((t) => t === typeArg);
    if (!type) {
      throw new ConfigurationError(`Unknown source type "${typeArg}" (expected ${SOURCE_TYPES.join(' or ')})`);
    }
  }

  const sourceArg = valueOf('source');
  let sourceId: number | undefined;
  if (sourceArg !== undefined) {
    sourceId = Number(sourceArg);
    if (!Number.isInteger(sourceId) || sourceId <= 0) {
      throw new ConfigurationError(`Invalid source id "${sourceArg}"`);
    }
  }

  let mode: CliOptions['mode'] = 'service';
  if (args.includes('--seed')) mode = 'seed';
  else if (args.includes('--status')) mode = 'status';
  else if (sourceId !== undefined) mode = 'source';
  else if (args.includes('--run')) mode = 'run';

  return { mode, type, sourceId, force: args.includes('--force') };
}
