#!/usr/bin/env node
// hooktask CLI

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2));
