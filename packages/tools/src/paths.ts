import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

// Workspace root is two levels up from packages/tools/src
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const workspaceRoot = resolve(__dirname, '../../..');

export const rosterSchemaPath = join(workspaceRoot, 'schemas/roster.schema.json');

export const sampleRosterPath = join(workspaceRoot, 'rosters/sample.roster.json');
