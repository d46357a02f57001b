/**
 * Package version, read from package.json next to the sources.
 */
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

const __dirname = dirname(fileURLToPath(import.meta.url));

export const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')),
).version;
