#!/usr/bin/env node

/**
 * @pratidhvani/server — Entry point for the `pratidhvani` binary.
 */

import { run } from "./cli.js";

run(process.argv.slice(2)).then(
	(code) => process.exit(code),
	(err: unknown) => {
		process.stderr.write(`\nFatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
		process.exit(1);
	},
);
