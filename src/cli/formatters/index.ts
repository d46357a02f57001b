/**
 * Formatter selection by name.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { JsonFormatter } from './json.js';
import { StylishFormatter } from './stylish.js';
import { TextFormatter } from './text.js';
import { OUTPUT_FORMATS, type FormatOptions, type IFormatter, type OutputFormat } from './types.js';

export * from './types.js';
export { TextFormatter } from './text.js';
export { StylishFormatter } from './stylish.js';
export { JsonFormatter } from './json.js';

function isOutputFormat(name: string): name is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === name);
}

/**
 * Create the formatter for `name`. Unknown names are a configuration error.
 */
export function createFormatter(name: string, options: Partial<FormatOptions> = {}): IFormatter {
  if (!isOutputFormat(name)) {
    throw new ConfigError(
      ErrorCodes.UNKNOWN_FORMAT,
      `unsupported output format "${name}" (valid choices are ${OUTPUT_FORMATS.map((f) => `'${f}'`).join(', ')})`,
      { format: name }
    );
  }

  switch (name) {
    case 'text':
      return new TextFormatter(options);
    case 'stylish':
      return new StylishFormatter(options);
    case 'json':
      return new JsonFormatter();
  }
}
