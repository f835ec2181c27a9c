#!/usr/bin/env node

import { errorMessage } from './errors';
import { EXIT_CODES, exitCodeFor } from './exitCodes';
import { nodeFileSystem } from './config';
import { Gateway, init } from './init';

async function main(): Promise<void> {
  let gateway: Gateway;
  try {
    gateway = await init(nodeFileSystem, process.argv.slice(1));
  } catch (error) {
    console.error('❌ Failed to start gateway:', errorMessage(error));
    process.exit(exitCodeFor(error));
  }

  const onSignal = () => {
    gateway.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('❌ Error during shutdown:', errorMessage(error));
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Unexpected failure:', error);
    process.exit(EXIT_CODES.UNKNOWN_FAILURE);
  });
}
