import { checkStory, readStoryFile, resolveStoryPath } from './storyFile.js';

/**
 * Validates a story pack file (schema + semantics)
 */
function validateStory() {
  const storyPath = resolveStoryPath(process.argv[2]);

  try {
    console.log(`Loading story from: ${storyPath}`);
    const report = checkStory(readStoryFile(storyPath));

    // Schema validation
    console.log('🔍 Schema validation...');
    if (report.schemaErrors.length > 0) {
      console.error('❌ Schema validation failed:');
      for (const error of report.schemaErrors) {
        console.error(`   ${error}`);
      }
      console.error('\n❌ Validation failed with errors');
      process.exit(1);
    }
    console.log('✅ Schema validation passed\n');

    if (report.storyPack) {
      console.log(`📖 Story: ${report.storyPack.id}`);
      console.log(`   Title: ${report.storyPack.title}`);
      console.log(`   Version: ${report.storyPack.version}`);
      console.log(`   Nodes: ${report.storyPack.nodes.length}\n`);
    }

    // Semantic validation
    console.log('🔍 Semantic validation...');
    const errors = report.issues.filter((i) => i.type === 'error');
    const warnings = report.issues.filter((i) => i.type === 'warning');

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

    if (report.issues.length === 0) {
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

validateStory();
