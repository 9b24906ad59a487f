import { readFileSync } from 'fs';
import { resolve } from 'path';
import { sampleRosterPath } from './paths.js';
import { validateRosterSchema } from './validateSchema.js';
import { validateRosterSemantics } from './validateSemantics.js';

/**
 * Validates a roster file (schema + semantics)
 */
function validateRoster() {
  const rosterPath = process.argv[2] ? resolve(process.argv[2]) : sampleRosterPath;

  try {
    console.log(`Loading roster from: ${rosterPath}`);
    const roster = JSON.parse(readFileSync(rosterPath, 'utf-8'));

    console.log(`\n📜 Validating roster: ${roster.id || 'unknown'}`);
    console.log(`   Title: ${roster.title || 'N/A'}\n`);

    // Schema validation
    console.log('🔍 Schema validation...');
    const schemaResult = validateRosterSchema(roster);
    if (!schemaResult.valid) {
      console.error('❌ Schema validation failed:');
      for (const error of schemaResult.errors) {
        console.error(`   ${error}`);
      }
      console.error('❌ Validation failed with errors');
      process.exit(1);
    }
    console.log('✅ Schema validation passed\n');

    // Semantic validation
    console.log('🔍 Semantic validation...');
    const semanticIssues = validateRosterSemantics(schemaResult.roster);

    const errors = semanticIssues.filter((i) => i.type === 'error');
    const warnings = semanticIssues.filter((i) => i.type === 'warning');

    if (errors.length > 0) {
      console.error(`❌ Found ${errors.length} semantic error(s):`);
      for (const error of errors) {
        const pathStr = error.path ? ` (${error.path})` : '';
        console.error(`   ${error.message}${pathStr}`);
      }
    }

    if (warnings.length > 0) {
      console.warn(`⚠️  Found ${warnings.length} semantic warning(s):`);
      for (const warning of warnings) {
        const pathStr = warning.path ? ` (${warning.path})` : '';
        console.warn(`   ${warning.message}${pathStr}`);
      }
    }

    if (errors.length === 0 && warnings.length === 0) {
      console.log('✅ Semantic validation passed\n');
    } else {
      console.log('');
    }

    // Summary
    if (errors.length > 0) {
      console.error('❌ Validation failed with errors');
      process.exit(1);
    } else if (warnings.length > 0) {
      console.warn('⚠️  Validation passed with warnings');
      process.exit(0);
    } else {
      console.log('✅ All validations passed!');
      process.exit(0);
    }
  } catch (error) {
    if (error instanceof Error) {
      console.error('❌ Validation error:', error.message);
      if (error.stack) {
        console.error(error.stack);
      }
    } else {
      console.error('❌ Validation error:', error);
    }
    process.exit(1);
  }
}

validateRoster();
