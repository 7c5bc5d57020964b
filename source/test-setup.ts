import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['HYBRIDEX_HOME'] =
	process.env['HYBRIDEX_HOME'] ??
	path.join(os.tmpdir(), `hybridex-test-home-${process.pid}`);
