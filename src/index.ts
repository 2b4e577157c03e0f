#!/usr/bin/env node
// src/index.ts

import {main} from './main/cli';
import {err} from './main/utils/logger';

try {
    process.exitCode = main(process.argv);
} catch (e) {
    err('main', 'unexpected failure:', e);
    process.exitCode = 1;
}
