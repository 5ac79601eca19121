import { createRetryPolicy, GeotagConfig, loadConfig, RetryMode } from './config';
import { logger } from './logger';
import { ImageMetadataExtractor } from './metadata/ImageMetadataExtractor';
import { VideoLogExtractor } from './metadata/VideoLogExtractor';
import { expandImagePaths } from './utils/files';

const VERSION = '0.1.0';

export class GeotagCliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeotagCliError';
  }
}

type CommandName = 'image' | 'images' | 'video' | 'validate';

type CommandOptions = {
  config?: string;
  output?: string;
  include?: string;
  writeTable: boolean;
  nonInteractive: boolean;
};

type ParsedArgs = {
  kind: CommandName;
  positionals: string[];
  options: CommandOptions;
};

const COMMAND_FLAGS: Record<CommandName, readonly string[]> = {
  image: ['--config'],
  images: ['--config', '--output', '--include', '--no-table', '--non-interactive'],
  video: ['--config', '--output', '--no-table', '--non-interactive'],
  validate: ['--config'],
};

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printHelp();
    return;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  const parsed = parseArgs(args);
  const config = await loadConfig(parsed.options.config ?? process.env.GEOTAG_CONFIG, {
    outputDir: parsed.options.output,
    include: parsed.options.include,
    retryMode: parsed.options.nonInteractive ? 'backoff' : undefined,
  });

  switch (parsed.kind) {
    case 'validate':
      printConfigSummary(config);
      logger.info('Configuration looks good.');
      break;
    case 'image':
      await handleImageCommand(parsed, config);
      break;
    case 'images':
      await handleImagesCommand(parsed, config);
      break;
    case 'video':
      await handleVideoCommand(parsed, config);
      break;
  }
}

export function parseArgs(args: string[]): ParsedArgs {
  if (args.length === 0) {
    throw new GeotagCliError('Provide a command (image | images | video | validate).');
  }

  const [first, ...rest] = args;
  if (!isCommandName(first)) {
    throw new GeotagCliError(`Unknown command "${first}".`);
  }

  const { positionals, options } = parseCommandOptions(first, rest);
  if ((first === 'image' || first === 'video') && positionals.length !== 1) {
    throw new GeotagCliError(`'${first}' takes exactly one file path.`);
  }
  if (first === 'images' && positionals.length === 0) {
    throw new GeotagCliError("'images' needs at least one file or directory.");
  }
  if (first === 'validate' && positionals.length > 0) {
    throw new GeotagCliError(`Unexpected argument "${positionals[0]}".`);
  }

  return { kind: first, positionals, options };
}

function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(COMMAND_FLAGS, value);
}

function parseCommandOptions(
  command: CommandName,
  tokens: string[]
): { positionals: string[]; options: CommandOptions } {
  const allowed = COMMAND_FLAGS[command];
  const positionals: string[] = [];
  const options: CommandOptions = { writeTable: true, nonInteractive: false };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('-')) {
      positionals.push(token);
      continue;
    }
    const { flag: rawFlag, inlineValue } = splitFlagToken(token);
    const flag = expandShortFlag(rawFlag);
    if (!allowed.includes(flag)) {
      throw new GeotagCliError(`Unknown option "${rawFlag}" for '${command}'.`);
    }
    switch (flag) {
      case '--config': {
        const { value, nextIndex } = consumeOptionValue(rawFlag, inlineValue, tokens, i);
        options.config = value;
        i = nextIndex;
        break;
      }
      case '--output': {
        const { value, nextIndex } = consumeOptionValue(rawFlag, inlineValue, tokens, i);
        options.output = value;
        i = nextIndex;
        break;
      }
      case '--include': {
        const { value, nextIndex } = consumeOptionValue(rawFlag, inlineValue, tokens, i);
        options.include = value;
        i = nextIndex;
        break;
      }
      case '--no-table':
        options.writeTable = false;
        break;
      case '--non-interactive':
        options.nonInteractive = true;
        break;
    }
  }
  return { positionals, options };
}

function expandShortFlag(flag: string): string {
  switch (flag) {
    case '-c':
      return '--config';
    case '-o':
      return '--output';
    default:
      return flag;
  }
}

function splitFlagToken(token: string): { flag: string; inlineValue?: string } {
  if (token.startsWith('--')) {
    const eqIndex = token.indexOf('=');
    if (eqIndex !== -1) {
      return { flag: token.slice(0, eqIndex), inlineValue: token.slice(eqIndex + 1) };
    }
  }
  return { flag: token };
}

function consumeOptionValue(
  flag: string,
  inlineValue: string | undefined,
  tokens: string[],
  currentIndex: number
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined && inlineValue.length > 0) {
    return { value: inlineValue, nextIndex: currentIndex };
  }
  const nextToken = tokens[currentIndex + 1];
  if (!nextToken) {
    throw new GeotagCliError(`Option ${flag} requires a value.`);
  }
  return { value: nextToken, nextIndex: currentIndex + 1 };
}

async function handleImageCommand(parsed: ParsedArgs, config: GeotagConfig): Promise<void> {
  const extractor = new ImageMetadataExtractor({
    deviceProfiles: config.deviceProfiles,
  });
  const record = await extractor.extractImage(parsed.positionals[0]);
  console.log(JSON.stringify(record, null, 2));
}

async function handleImagesCommand(parsed: ParsedArgs, config: GeotagConfig): Promise<void> {
  const filePaths = await expandImagePaths(parsed.positionals, config.include);
  if (filePaths.length === 0) {
    throw new GeotagCliError(`No images matching ${config.include} found.`);
  }

  const extractor = new ImageMetadataExtractor({
    deviceProfiles: config.deviceProfiles,
    retryPolicy: createRetryPolicy(config.retry),
    outputDir: config.outputDir,
    imageTableName: config.imageTableName,
  });
  const records = await extractor.extractImageBatch(filePaths, {
    writeTable: parsed.options.writeTable,
  });
  if (!parsed.options.writeTable) {
    console.log(JSON.stringify(records, null, 2));
  }
}

async function handleVideoCommand(parsed: ParsedArgs, config: GeotagConfig): Promise<void> {
  const extractor = new VideoLogExtractor({
    retryPolicy: createRetryPolicy(config.retry),
    outputDir: config.outputDir,
  });
  const records = await extractor.extractVideoLog(parsed.positionals[0], {
    writeTable: parsed.options.writeTable,
  });
  if (!parsed.options.writeTable) {
    console.log(JSON.stringify(records, null, 2));
  }
}

function printConfigSummary(config: GeotagConfig): void {
  logger.info(
    {
      configPath: config.sourcePath ?? '(defaults)',
      outputDir: config.outputDir,
      imageTableName: config.imageTableName,
      include: config.include,
      retry: config.retry,
      deviceProfiles: config.deviceProfiles.map((profile) => `${profile.make}/${profile.model}`),
    },
    'Loaded geotag-extract config.'
  );
}

function printHelp(): void {
  console.log(`geotag-extract v${VERSION}`);
  console.log('Usage: geotag-extract <command> [options]\n');
  console.log('Commands:');
  console.log('  image <file>            Print the metadata record of one image as JSON.');
  console.log('  images <path...>        Extract a batch of images (directories are listed).');
  console.log('  video <log>             Extract records from a video subtitle log.');
  console.log('  validate                Load the config file and print it.\n');
  console.log('Options:');
  console.log('  -c, --config <path>     Path to config (JSON). Defaults to $GEOTAG_CONFIG.');
  console.log('  -o, --output <dir>      Directory for CSV tables.');
  console.log('      --include <glob>    Files to take from directories (default *.{jpg,jpeg}).');
  console.log('      --no-table          Print records as JSON instead of writing CSV.');
  console.log('      --non-interactive   Retry locked tables with backoff instead of prompting.');
  console.log('  -h, --help              Show this help message.');
  console.log('  -v, --version           Show CLI version.');
}

export { loadConfig, GeotagConfig, RetryMode };
export { ImageMetadataExtractor, extractImage, extractImageBatch } from './metadata/ImageMetadataExtractor';
export { VideoLogExtractor, extractVideoLog } from './metadata/VideoLogExtractor';
export { parseVideoLog } from './metadata/videoLogParser';
export { writeTable, TableExportError } from './export/TableExporter';
export {
  createPromptRetryPolicy,
  createBackoffRetryPolicy,
  RetryAbortedError,
  RetryPolicy,
} from './export/retryPolicy';
export { dmsToDecimal } from './utils/coordinates';
export { findDeviceProfile } from './devices/selector';
export { DEVICE_PROFILES } from './devices/registry';
export * from './metadata/errors';
export { ImageMetadataRecord } from './types/ImageMetadata';
export { VideoLogRecord } from './types/VideoLogMetadata';
