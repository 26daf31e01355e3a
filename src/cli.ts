#!/usr/bin/env node
import { readFileSync } from 'fs';
import { createProgram } from './program.js';

const pkg: { version: string } = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));

createProgram({ version: pkg.version, env: process.env, cwd: process.cwd() }).parse();
