#!/usr/bin/env node

import { main } from './main';

async function start() {
  process.exitCode = main(process.argv.slice(2), process.cwd());
}

start().catch((err) => {
  console.error('Error running access-gate:', err);
  process.exit(1);
});
