// src/index.ts

import process from 'node:process';
import { createProgram, printBanner } from './cli/index.ts';

printBanner();
await createProgram().parseAsync(process.argv);
