/**
 * YAML parsing utilities.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  // An empty document parses to null; treat it as an empty mapping.
  const parsed = parseYaml(content) ?? {};
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof ConfigError) {
      // Re-throw with file path context
      throw new ConfigError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}

/**
 * Format Zod errors into a readable string.
 */
function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
