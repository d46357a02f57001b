#!/usr/bin/env node
import { createErrcheckCli } from '../cli/index.js';

await createErrcheckCli().parseAsync(process.argv);
