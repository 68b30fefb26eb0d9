#!/usr/bin/env node
/**
 * Mirror Xref - CLI
 *
 * Command-line interface over a manifest project: summary statistics,
 * navigation targets for a member, and configuration.
 *
 * @module cli
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { generateDefaultConfig, loadConfig, validateConfig } from './config.js';
import { openProject } from './resolver.js';
import { LookupError, wrapError } from './utils/errors.js';
import { isDirectory } from './utils/paths.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('xref')
  .description('Navigate between exported API members and the imports and mixins that use them')
  .version(VERSION);

function projectRoot(option: string): string {
  const root = path.resolve(option);
  if (!isDirectory(root)) {
    throw new LookupError(`Project directory not found: ${root}`, {
      userMessage: 'Pass an existing directory with --path.',
    });
  }
  return root;
}

// ============================================================================
// STATS COMMAND
// ============================================================================

program
  .command('stats')
  .description('Show cross-reference statistics for the project')
  .option('-p, --path <path>', 'Project path', process.cwd())
  .action(async (options: { path: string }) => {
    const project = await openProject(projectRoot(options.path));
    const summary = project.resolver.summarize();

    console.log(`\n📊 Cross-references for ${project.root}\n`);
    console.log(`  Manifests:     ${project.files.length}`);
    console.log(`  Exports:       ${summary.exports}`);
    console.log(`  References:    ${summary.references}`);
    console.log(`  Declarations:  ${summary.declarations}`);
    console.log(`  Implementers:  ${summary.implementers}`);
    console.log(`  Unresolved:    ${summary.unresolved}`);

    if (project.errors.length > 0) {
      console.log(`\n⚠️  ${project.errors.length} manifest(s) skipped:`);
      for (const error of project.errors) {
        console.log(`  • ${error.message}`);
      }
    }
    console.log('');
  });

// ============================================================================
// SHOW COMMAND
// ============================================================================

program
  .command('show <member>')
  .description('Show navigation targets for Type.member')
  .option('-p, --path <path>', 'Project path', process.cwd())
  .action(async (member: string, options: { path: string }) => {
    const separator = member.lastIndexOf('.');
    if (separator <= 0 || separator === member.length - 1) {
      throw new LookupError(`Expected Type.member, got "${member}"`);
    }
    const typeName = member.slice(0, separator);
    const memberName = member.slice(separator + 1);

    const project = await openProject(projectRoot(options.path));
    const declarations = project.codebase.findDeclarations(typeName, memberName);
    if (declarations.length === 0) {
      throw new LookupError(`No declaration named ${member}`);
    }

    for (const declaration of declarations) {
      const markers = project.resolver.markersFor(declaration);
      console.log(`\n🔗 ${typeName}.${declaration.name}`);

      if (markers.length === 0) {
        console.log('  (nothing to navigate to)');
        continue;
      }

      for (const marker of markers) {
        console.log(`  ${marker.kind}: ${marker.tooltip}`);
        for (const target of marker.targets) {
          console.log(`    → ${target.declaration.name}  ${target.containerText}`);
        }
      }
    }
    console.log('');
  });

// ============================================================================
// CONFIG COMMAND
// ============================================================================

program
  .command('config')
  .description('Show the effective configuration or create a default one')
  .option('-p, --path <path>', 'Project path', process.cwd())
  .option('-i, --init', 'Generate a new .xrefrc.json')
  .action(async (options: { path: string; init?: boolean }) => {
    const root = projectRoot(options.path);

    if (options.init) {
      const configPath = path.join(root, '.xrefrc.json');
      if (fs.existsSync(configPath)) {
        console.log(`⚠️  ${configPath} already exists`);
        return;
      }
      fs.writeFileSync(configPath, generateDefaultConfig() + '\n');
      console.log(`✅ Created ${configPath}`);
      return;
    }

    const config = await loadConfig(root);
    const { valid, errors } = validateConfig(config);
    console.log(JSON.stringify(config, null, 2));
    if (!valid) {
      console.log('\n❌ Configuration problems:');
      for (const error of errors) {
        console.log(`  • ${error}`);
      }
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(wrapError(error).toCliOutput());
  process.exit(1);
});
