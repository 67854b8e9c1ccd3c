#!/usr/bin/env node
import { run } from './cli';

run().then(code => {
  process.exitCode = code;
});
