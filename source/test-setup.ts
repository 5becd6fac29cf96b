import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['SYMDEX_HOME'] =
	process.env['SYMDEX_HOME'] ??
	path.join(os.tmpdir(), `symdex-test-home-${process.pid}`);
