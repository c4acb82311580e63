#!/usr/bin/env node

import { runCli } from './Commands.js';

process.exit(runCli(process.argv.slice(2)));
