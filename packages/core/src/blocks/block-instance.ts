/**
 * Shared contract of every block instance: identity, label, disabled flag,
 * settings, and the serialize / deserialize / generate capabilities each
 * family implements.
 */

import { InvalidSettingError, ParseError } from "../errors.js";
import type { GenerationContext } from "../generator/generation-context.js";
import type { BlockDescriptor } from "../registry/descriptor.js";
import { NotationError, formatSettingLine, parseSettingLine } from "../settings/setting-notation.js";
import { resolveSetting } from "../settings/setting-resolver.js";
import type { BlockSetting, SettingValue } from "../settings/setting-types.js";
import { settingValuesEqual } from "../settings/setting-types.js";

/** One line of a block body, with its 1-based position in the script. */
export interface SourceLine {
  readonly text: string;
  readonly lineNumber: number;
}

export interface SerializeOptions {
  /** Skip settings whose value equals the parameter default. */
  readonly omitDefaults?: boolean;
}

/** Indentation of setting lines inside a block body. */
export const SETTING_INDENT = "  ";

const DISABLED_LINE = "DISABLED";
const LABEL_PREFIX = "LABEL:";

/**
 * Base of the block families. Subclasses provide the family body grammar
 * and the code they emit.
 */
export abstract class BlockInstanceBase<D extends BlockDescriptor = BlockDescriptor> {
  /** Kind id, equal to the descriptor id. */
  readonly id: string;
  disabled = false;
  label: string;
  /** Current settings keyed by parameter name. */
  readonly settings = new Map<string, BlockSetting>();

  constructor(readonly descriptor: D) {
    this.id = descriptor.id;
    this.label = descriptor.name;
    for (const param of descriptor.parameters.values()) {
      this.settings.set(param.name, { name: param.name, value: param.default });
    }
  }

  /** Current value of a setting, or undefined if the instance has none. */
  getSetting(name: string): SettingValue | undefined {
    return this.settings.get(name)?.value;
  }

  /**
   * Bind a value to a setting. Names outside the descriptor are accepted
   * here and rejected by {@link serialize} and {@link generate}.
   */
  setSetting(name: string, value: SettingValue): this {
    this.settings.set(name, { name, value });
    return this;
  }

  // ---------------------------------------------------------------------------
  // Text
  // ---------------------------------------------------------------------------

  /**
   * The body lines of this block, without the `BLOCK:<id>` header.
   *
   * @throws InvalidSettingError if a setting is not a parameter of the descriptor
   */
  serialize(options: SerializeOptions = {}): string[] {
    this.assertSettingsValid();
    const lines: string[] = [];
    if (this.disabled) {
      lines.push(DISABLED_LINE);
    }
    if (this.label !== this.descriptor.name) {
      lines.push(`${LABEL_PREFIX}${this.label}`);
    }
    lines.push(...this.serializeBody(options));
    return lines;
  }

  /**
   * Read the body lines of this block, without the header.
   *
   * @returns The number of lines consumed
   * @throws ParseError tagged with the offending line
   */
  deserialize(lines: readonly SourceLine[]): number {
    let index = 0;
    while (index < lines.length) {
      const line = lines[index];
      if (line === undefined) break;
      const text = this.headerText(line);
      if (text === undefined) break;
      if (text === DISABLED_LINE) {
        this.disabled = true;
      } else if (text.startsWith(LABEL_PREFIX)) {
        this.label = text.slice(LABEL_PREFIX.length).trim();
      } else if (text !== "") {
        break;
      }
      index++;
    }
    this.deserializeBody(lines.slice(index));
    return lines.length;
  }

  /** The text of a line as a `DISABLED` or `LABEL:` candidate, or undefined if it cannot be one. */
  protected headerText(line: SourceLine): string | undefined {
    return line.text.trim();
  }

  protected abstract serializeBody(options: SerializeOptions): string[];

  protected abstract deserializeBody(lines: readonly SourceLine[]): void;

  /** Setting lines in descriptor parameter order. */
  protected serializeSettings(options: SerializeOptions): string[] {
    const lines: string[] = [];
    for (const param of this.descriptor.parameters.values()) {
      const setting = this.settings.get(param.name);
      if (setting === undefined) continue;
      if (options.omitDefaults === true && settingValuesEqual(setting.value, param.default)) continue;
      lines.push(SETTING_INDENT + formatSettingLine(setting));
    }
    return lines;
  }

  /** Parse one `<name> = <value>` line into the settings. */
  protected readSettingLine(line: SourceLine): void {
    try {
      const setting = parseSettingLine(line.text, this.descriptor);
      this.settings.set(setting.name, setting);
    } catch (err) {
      if (err instanceof NotationError) {
        throw new ParseError(line.lineNumber, line.text, err.message);
      }
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Code
  // ---------------------------------------------------------------------------

  /**
   * Emit the statements of this block.
   *
   * @throws InvalidSettingError for settings outside the descriptor
   */
  generate(context: GenerationContext): string {
    this.assertSettingsValid();
    return this.generateBody(context);
  }

  protected abstract generateBody(context: GenerationContext): string;

  /**
   * The resolved expression of a setting.
   *
   * @throws InvalidSettingError if the instance has no value for it
   */
  protected argument(name: string): string {
    const setting = this.settings.get(name);
    if (setting === undefined) {
      throw new InvalidSettingError(this.id, name, "missing");
    }
    return resolveSetting(setting);
  }

  private assertSettingsValid(): void {
    for (const name of this.settings.keys()) {
      if (!this.descriptor.parameters.has(name)) {
        throw new InvalidSettingError(this.id, name);
      }
    }
  }
}
