#!/usr/bin/env node
import 'dotenv/config';
import { main } from './cli.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Low-float screen failed:', err);
    process.exit(1);
  });
