#!/usr/bin/env node
import { runCli } from './presentation/cli/main';

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error('💥 Fatal error:', error);
        process.exitCode = 1;
    });
