#!/usr/bin/env node
import { createSimpleCli } from '../cli/index.js';

await createSimpleCli().parseAsync(process.argv);
