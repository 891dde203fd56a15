#!/usr/bin/env node

import { createRequire } from 'node:module';
import { createProgram } from '../src/program.js';

const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

await createProgram(version).parseAsync();
