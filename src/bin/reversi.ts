#!/usr/bin/env node
import { main } from '../cli';
import { logger } from '../utils/logger';

try {
    process.exitCode = main(process.argv.slice(2));
} catch (error) {
    logger.error('reversi failed', { error });
    process.exitCode = 1;
}
