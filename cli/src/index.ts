#!/usr/bin/env node

/**
 * otakeeper CLI — Entry Point
 *
 * Packaging:
 *   otakeeper pack <binary>              Build <name>-ota.zip, optionally signed
 *   otakeeper inspect <package>          Check a package's digest and signature
 *
 * Devices:
 *   otakeeper upload <package> <hosts…>  Deploy a package, host by host
 *   otakeeper status <hosts…>            Show the version each host runs
 */

import { createProgram } from "./program";

// Parse command line
createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
