#!/usr/bin/env node

import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createCli } from './cli.js';
import { errorMessage } from './errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(await fs.readFile(path.join(__dirname, '..', 'package.json'), 'utf-8')));

createCli({ version: pkg.version })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`\nError: ${errorMessage(err)}`);
    process.exit(1);
  });
