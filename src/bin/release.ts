#!/usr/bin/env node
import { runMain } from '../cli';

runMain(['release', ...process.argv.slice(2)]);
