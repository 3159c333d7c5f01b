import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

// Resolves from both src/ and dist/
const pkg: { version: string } = require('../package.json');

export const VERSION = pkg.version;
