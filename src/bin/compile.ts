#!/usr/bin/env node
import { runMain } from '../cli';

runMain(['compile', ...process.argv.slice(2)]);
