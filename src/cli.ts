import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { VTAPConfig } from './config.js';
import { renderDocs } from './docs.js';
import { ConfigFileError, ConfigFormatError, VTAPConfigError, ValidationError } from './errors.js';
import { rangedInt } from './fields.js';
import { CONFIG_HEADER, ConfigGenerator } from './generator.js';
import type { TextSink } from './generator.js';
import { KBSourceBuilder, KeyboardConfig } from './keyboard.js';
import { ConfigParser } from './parser.js';
import { GoogleSmartTapConfig } from './smarttap.js';
import { AppleVASConfig } from './vas.js';

export const VERSION = '0.1.0';
export const DEFAULT_OUTPUT = 'config.txt';
export const DEFAULT_COMMENT = 'Generated by VTAP100 CLI';

/** Exit code for bad usage (unknown command or option) */
export const EXIT_USAGE = 2;

/**
 * Where the CLI writes. Defaults to the process streams.
 */
export interface CliIO {
  stdout: TextSink;
  stderr: TextSink;
}

const USAGE = `Usage: vtap100 <command> [options]

Commands:
  generate            Generate a config.txt for a wallet pass
  template <file>     Print the template form of an existing config.txt
  validate <file>     Check a config.txt for errors
  docs                Show the parameter reference

Options for generate:
  -a, --apple-vas <id>     Apple VAS merchant ID (pass.*)
  -g, --google-st <id>     Google Smart Tap collector ID
  -k, --key-slot <n>       Key slot for the pass, 1-6 (default: 1)
      --key-version <n>    Smart Tap key version (default: 1)
      --no-keyboard        Leave keyboard emulation off
  -o, --output <file>      Output file (default: ${DEFAULT_OUTPUT})
  -c, --comment <text>     Comment after the header (default: "${DEFAULT_COMMENT}")
      --stdout             Print instead of writing a file
      --template           Write the pass lines as a template loop

Options for template:
  -o, --output <file>      Write to a file instead of printing

  -h, --help               Show this help
  -v, --version            Show the version`;

class UsageError extends VTAPConfigError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isParseArgsError(error: unknown): error is TypeError {
  return (
    error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

function intOption(name: string, value: string, min: number, max?: number): number {
  try {
    return rangedInt(name, Number(value), min, max);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new UsageError(`--${name}: ${error.message.slice(name.length + 2)}`);
    }
    throw error;
  }
}

/**
 * Command-line front end. Never exits the process; returns the exit code.
 *
 * @param argv - Arguments after the program name
 */
export async function run(argv: string[], io: CliIO = process): Promise<number> {
  const out = (line = ''): void => void io.stdout.write(`${line}\n`);
  const err = (line: string): void => void io.stderr.write(`${line}\n`);

  const [command, ...rest] = argv;
  try {
    switch (command) {
      case 'generate':
        return await generateCommand(rest, out);
      case 'template':
        return await templateCommand(rest, out);
      case 'validate':
        return await validateCommand(rest, out);
      case 'docs':
        out(renderDocs());
        return 0;
      case '-v':
      case '--version':
        out(VERSION);
        return 0;
      case undefined:
      case '-h':
      case '--help':
        out(USAGE);
        return 0;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError || isParseArgsError(error)) {
      err(`Error: ${error.message}`);
      err(`Run "vtap100 --help" for usage.`);
      return EXIT_USAGE;
    }
    if (error instanceof VTAPConfigError) {
      err(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

// ============================================================================
// Commands
// ============================================================================

type Print = (line?: string) => void;

async function generateCommand(args: string[], out: Print): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      'apple-vas': { type: 'string', short: 'a' },
      'google-st': { type: 'string', short: 'g' },
      'key-slot': { type: 'string', short: 'k' },
      'key-version': { type: 'string' },
      'no-keyboard': { type: 'boolean' },
      output: { type: 'string', short: 'o' },
      comment: { type: 'string', short: 'c' },
      stdout: { type: 'boolean' },
      template: { type: 'boolean' },
    },
  });

  const merchantId = values['apple-vas'];
  const collectorId = values['google-st'];
  if (!merchantId && !collectorId) {
    throw new UsageError('Please provide at least --apple-vas or --google-st');
  }
  const keySlot = intOption('key-slot', values['key-slot'] ?? '1', 1, 6);
  const keyVersion = intOption('key-version', values['key-version'] ?? '1', 0);

  let config = new VTAPConfig();
  const summary: string[] = [];
  if (merchantId) {
    config = config.addVAS(new AppleVASConfig({ merchantId, keySlot }));
    summary.push(`Apple VAS: ${merchantId} (key slot ${keySlot})`);
  }
  if (collectorId) {
    config = config.addSmartTap(new GoogleSmartTapConfig({ collectorId, keySlot, keyVersion }));
    summary.push(`Google Smart Tap: ${collectorId} (key slot ${keySlot}, key version ${keyVersion})`);
  }
  if (!values['no-keyboard']) {
    const source = new KBSourceBuilder().mobilePass().build();
    config = config.with({ keyboard: new KeyboardConfig({ logMode: true, source }) });
    summary.push(`Keyboard emulation: source ${source}`);
  }

  const generator = new ConfigGenerator(config);
  const comment = values.comment ?? DEFAULT_COMMENT;
  if (values.stdout) {
    out(values.template ? generator.generateTemplate(comment) : generator.generate(comment));
    return 0;
  }

  const output = values.output ?? DEFAULT_OUTPUT;
  if (values.template) {
    await generator.writeTemplateToFile(output, comment);
  } else {
    await generator.writeToFile(output, comment);
  }
  summary.forEach((line) => out(line));
  out(`Configuration saved to: ${output}`);
  return 0;
}

async function templateCommand(args: string[], out: Print): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: { output: { type: 'string', short: 'o' } },
  });
  const [file] = positionals;
  if (file === undefined) {
    throw new UsageError('template needs a config file');
  }

  const generator = new ConfigGenerator(await new ConfigParser().parseFile(file));
  if (values.output === undefined) {
    out(generator.generateTemplate());
    return 0;
  }
  await generator.writeTemplateToFile(values.output);
  out(`Template saved to: ${values.output}`);
  return 0;
}

async function validateCommand(args: string[], out: Print): Promise<number> {
  const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
  const [file] = positionals;
  if (file === undefined) {
    throw new UsageError('validate needs a config file');
  }

  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigFileError(`Failed to read ${file}: ${reason}`, file, error);
  }

  const report = validateContent(content);
  out(`Validating: ${file}`);
  if (report.errors.length > 0) {
    out('Errors found:');
    report.errors.forEach((error) => out(`  - ${error}`));
  } else {
    out('No errors found');
  }
  if (report.warnings.length > 0) {
    out('Warnings:');
    report.warnings.forEach((warning) => out(`  - ${warning}`));
  }
  return report.errors.length > 0 ? 1 : 0;
}

/**
 * Findings of a config.txt check
 */
export interface ValidationReport {
  errors: string[];
  warnings: string[];
}

/**
 * Check config.txt content: header, line shape, unknown keys and values
 * rejected by the section models
 */
export function validateContent(content: string): ValidationReport {
  const errors: string[] = [];
  const warnings: string[] = [];

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === '' || line.startsWith(';') || line.startsWith('!')) {
      return;
    }
    if (!line.includes('=')) {
      errors.push(`Line ${index + 1}: Invalid format (missing '='): ${line}`);
    }
  });

  const parser = new ConfigParser({
    onUnknownLine: (line, lineNumber) => {
      if (line.includes('=')) {
        warnings.push(`Line ${lineNumber}: Unknown key or value: ${line}`);
      }
    },
  });
  try {
    parser.parse(content);
  } catch (error) {
    if (error instanceof ConfigFormatError) {
      errors.unshift(`File must start with '${CONFIG_HEADER}'`);
    } else if (error instanceof ValidationError) {
      errors.push(error.message);
    } else {
      throw error;
    }
  }

  return { errors, warnings };
}
