import { writeFile } from 'node:fs/promises';
import { ConfigFileError } from './errors.js';
import type { VTAPConfig } from './config.js';
import type { GeneratorOptions } from './types.js';

export const CONFIG_HEADER = '!VTAPconfig';
export const STATIC_MARKER = '; === STATIC CONFIGURATION ===';

const DEFAULT_LINE_ENDING = '\n';

/**
 * Loop placeholder standing in for the VAS and Smart Tap lines in template
 * output. Rendered downstream with a `passes` list whose items carry `slot`,
 * `apple.merchant_id`, `apple.merchant_url`, `google.collector_id` and
 * `google.key_version`.
 */
export const PASSES_TEMPLATE_LINES: readonly string[] = [
  '; === MOBILE WALLET PASSES ===',
  '; (Rendered by Jinja2 - passes variable required)',
  '{% for passinfo in passes %}',
  '{% if passinfo.apple %}',
  'VAS{{ passinfo.slot }}MerchantID={{ passinfo.apple.merchant_id }}',
  'VAS{{ passinfo.slot }}KeySlot={{ passinfo.slot }}',
  '{% if passinfo.apple.merchant_url -%}',
  'VAS{{ passinfo.slot }}MerchantURL={{ passinfo.apple.merchant_url }}',
  '{% endif -%}',
  '{% endif %}',
  '{% if passinfo.google %}',
  'ST{{ passinfo.slot }}CollectorID={{ passinfo.google.collector_id }}',
  'ST{{ passinfo.slot }}KeySlot={{ passinfo.slot }}',
  '{% if passinfo.google.key_version is defined -%}',
  'ST{{ passinfo.slot }}KeyVersion={{ passinfo.google.key_version }}',
  '{% endif -%}',
  '{% endif %}',
  '{% endfor %}',
  '',
];

/**
 * Anything with a write method taking a string, e.g. `process.stdout`
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Renders a VTAPConfig as config.txt text
 *
 * @example
 * ```ts
 * const generator = new ConfigGenerator(config);
 * await generator.writeToFile('config.txt', 'Front desk reader');
 * ```
 */
export class ConfigGenerator {
  readonly config: VTAPConfig;
  private readonly lineEnding: string;
  private readonly trailingNewline: boolean;

  /**
   * @param config - Configuration to render
   * @param options - Output formatting options
   */
  constructor(config: VTAPConfig, options: GeneratorOptions = {}) {
    this.config = config;
    this.lineEnding = options.lineEnding ?? DEFAULT_LINE_ENDING;
    this.trailingNewline = options.trailingNewline ?? false;
  }

  /**
   * Generate the config.txt content
   * @param comment - Written as a `;` line after the header when non-empty
   */
  generate(comment?: string): string {
    const lines = this.preamble(comment);
    const { vasConfigs, vasDefaultPasses, smartTapConfigs, smartTapDefaultPasses } = this.config;

    if (vasConfigs.length > 0) {
      lines.push('; Apple VAS Configuration');
      vasConfigs.forEach((vas, i) => lines.push(...vas.toConfigLines(i + 1)));
    }
    if (vasDefaultPasses) {
      lines.push(vasDefaultPasses.toConfigLine());
    }

    if (smartTapConfigs.length > 0) {
      lines.push('; Google Smart Tap Configuration');
      smartTapConfigs.forEach((st, i) => lines.push(...st.toConfigLines(i + 1)));
    }
    if (smartTapDefaultPasses) {
      lines.push(smartTapDefaultPasses.toConfigLine());
    }

    lines.push(...this.staticLines());
    return this.join(lines);
  }

  /**
   * Generate a template: the pass lines are replaced by a loop placeholder,
   * the static sections are written as in {@link generate}.
   */
  generateTemplate(comment?: string): string {
    const lines = this.preamble(comment);
    lines.push(...PASSES_TEMPLATE_LINES);
    lines.push(STATIC_MARKER);
    lines.push(...this.staticLines());
    return this.join(lines);
  }

  /**
   * Write the generated content to a file (UTF-8, replaced whole)
   * @throws {ConfigFileError} If the file cannot be written
   */
  async writeToFile(path: string, comment?: string): Promise<void> {
    await writeText(path, this.generate(comment));
  }

  /**
   * Write the template content to a file
   * @throws {ConfigFileError} If the file cannot be written
   */
  async writeTemplateToFile(path: string, comment?: string): Promise<void> {
    await writeText(path, this.generateTemplate(comment));
  }

  /**
   * Write the generated content to a stream or other text sink
   */
  writeToStream(sink: TextSink, comment?: string): void {
    sink.write(this.generate(comment));
  }

  private preamble(comment: string | undefined): string[] {
    const lines = [CONFIG_HEADER];
    if (comment) {
      lines.push(`; ${comment}`);
    }
    return lines;
  }

  /**
   * Keyboard, NFC, DESFire and feedback sections, each skipped when absent
   * or when it has no lines to write
   */
  private staticLines(): string[] {
    const { keyboard, nfc, desfire, feedback } = this.config;
    const sections: Array<[string, string[] | undefined]> = [
      ['; Keyboard Emulation', keyboard?.toConfigLines()],
      ['; NFC Tag Settings', nfc?.toConfigLines()],
      ['; MIFARE DESFire Settings', desfire?.toConfigLines()],
      ['; LED/Beep Settings', feedback?.toConfigLines()],
    ];

    const lines: string[] = [];
    for (const [title, sectionLines] of sections) {
      if (sectionLines && sectionLines.length > 0) {
        lines.push(title, ...sectionLines);
      }
    }
    return lines;
  }

  private join(lines: string[]): string {
    const text = lines.join(this.lineEnding);
    return this.trailingNewline ? text + this.lineEnding : text;
  }
}

async function writeText(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigFileError(`Failed to write ${path}: ${reason}`, path, error);
  }
}

/**
 * Generate config.txt content in one call
 */
export function generate(config: VTAPConfig, comment?: string, options?: GeneratorOptions): string {
  return new ConfigGenerator(config, options).generate(comment);
}

/**
 * Generate template content in one call
 */
export function generateTemplate(
  config: VTAPConfig,
  comment?: string,
  options?: GeneratorOptions
): string {
  return new ConfigGenerator(config, options).generateTemplate(comment);
}
