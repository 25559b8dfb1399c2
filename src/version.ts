import { createRequire } from 'module';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

export const PLUGIN_NAME = 'sigmark';
export const PLUGIN_VERSION = packageJson.version;
export const DEFAULT_AUDIT_HEADER_VALUE = `Sigmark ${PLUGIN_VERSION}`;
