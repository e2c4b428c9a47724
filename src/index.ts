#!/usr/bin/env node
// Monarch portfolio tools - Main Entry Point
import 'dotenv/config';

import { createProgram } from './cli.js';

await createProgram().parseAsync(process.argv);
