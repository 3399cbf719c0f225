#!/usr/bin/env node
import { runMain } from '../cli';

runMain(['detect', ...process.argv.slice(2)]);
