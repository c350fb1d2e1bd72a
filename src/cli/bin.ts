#!/usr/bin/env node
import { main } from './lineage-tracer.js';

process.exitCode = await main(process.argv.slice(2));
