#!/usr/bin/env node
import { toErrorMessage } from '../tools/errors.js';
import { main } from './server.js';

main().catch((error: unknown) => {
    console.error(`Failed to start server: ${toErrorMessage(error)}`);
    process.exit(1);
});
