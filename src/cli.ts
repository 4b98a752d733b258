#!/usr/bin/env node
/**
 * blendpack - CLI Interface
 *
 * Command-line interface for inspecting scene files, tracing their
 * dependencies and packing them into self-contained projects.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig, type BlendpackConfig } from './config.js';
import { Packer } from './packer.js';
import { referencesFromJson, referencesToJson } from './reference-json.js';
import { SceneBinary } from './scene-binary.js';
import { traceDependencies } from './tracer.js';
import type { AssetReference } from './types/asset-reference.js';
import type { PackPlan } from './types/pack-plan.js';
import { createConsoleLogger } from './utils/logger.js';

type SequenceMode = 'expand' | 'literal';

interface TraceCommandOptions {
  readonly firstLevel?: boolean;
  readonly sequences: SequenceMode;
  readonly json?: boolean;
}

interface PackCommandOptions {
  readonly project: string;
  readonly sequences: SequenceMode;
  readonly rewrite?: boolean;
  readonly zip?: boolean;
  readonly dryRun?: boolean;
  readonly exclude?: string[];
  readonly relativeOnly?: boolean;
  readonly preTraced?: string;
  readonly manifest?: string;
  readonly concurrency?: number;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function sequencesOption(): Option {
  return new Option('--sequences <mode>', 'Expand frame sequences and UDIM tiles to the files on disk, or keep them literal')
    .choices(['expand', 'literal'])
    .makeOptionMandatory();
}

function printReferences(references: readonly AssetReference[]): void {
  for (const reference of references) {
    const flags = [reference.isSequence ? 'sequence' : '', reference.isOptional ? 'optional' : ''].filter(Boolean);
    console.log(`${reference.absolutePath}${flags.length > 0 ? ` [${flags.join(', ')}]` : ''}`);
    for (const usage of reference.usages) {
      const via = usage.via.length > 0 ? ` via ${usage.via.join(' → ')}` : '';
      console.log(`    ${usage.blockName} in ${usage.sceneFile}${via}`);
    }
  }
}

function manifestJson(plan: PackPlan): string {
  return `${JSON.stringify({ target: plan.target, outputPath: plan.outputPath, files: plan.manifest }, null, 2)}\n`;
}

function configWith(config: BlendpackConfig, concurrency: number | undefined): BlendpackConfig {
  return concurrency === undefined ? config : { ...config, concurrency };
}

program
  .name('blendpack')
  .description('Trace the dependencies of .blend scene files and pack them into self-contained projects')
  .version(version);

program
  .command('info')
  .description('Show the header and block statistics of a scene file')
  .argument('<scene>', 'Path to the scene file')
  .action(async (scene: string) => {
    try {
      const file = await SceneBinary.read({ filePath: resolve(scene) });
      const { header } = file;
      console.log(`File: ${file.filePath}`);
      console.log(`Version: ${header.version} (subversion ${file.fileSubversion})`);
      console.log(`File format: ${header.fileFormatVersion === 0 ? 'legacy header' : `large header v${header.fileFormatVersion}`}`);
      console.log(`Pointers: ${header.pointerSize * 8}-bit, ${header.endianness}-endian`);
      console.log(`Compression: ${file.compression}`);
      console.log(`Blocks: ${file.blocks.length} (${file.idBlocks().length} datablocks)`);
      console.log(`Struct types: ${file.structs.structs.length}`);
      file.close();
    } catch (error) {
      console.error('❌ Cannot read scene file:', message(error));
      process.exit(1);
    }
  });

program
  .command('trace')
  .description('List every external file a scene depends on')
  .argument('<scene>', 'Path to the scene file')
  .option('--first-level', 'Report linked libraries without following them')
  .addOption(sequencesOption().default('literal'))
  .option('--json', 'Print the references as JSON, suitable for pack --pre-traced')
  .action(async (scene: string, options: TraceCommandOptions) => {
    try {
      const config = loadConfig();
      const logger = createConsoleLogger(options.json ? 'error' : config.logLevel);
      const result = await traceDependencies(resolve(scene), {
        mode: options.firstLevel ? 'first-level' : 'hydrate',
        expandSequences: options.sequences === 'expand',
        logger,
      });

      if (options.json) {
        process.stdout.write(referencesToJson(result.references));
        return;
      }

      printReferences(result.references);
      console.log('');
      for (const [library, reason] of result.unresolvedLibraries) {
        console.log(`⚠️  Library not traced: ${library} (${reason})`);
      }
      console.log(`✅ Found ${result.references.length} dependencies`);
    } catch (error) {
      console.error('❌ Trace failed:', message(error));
      process.exit(1);
    }
  });

program
  .command('pack')
  .description('Copy a scene and its dependencies into a directory or ZIP archive')
  .argument('<scene>', 'Path to the scene file')
  .argument('<target>', 'Output directory, or archive path with --zip')
  .requiredOption('--project <dir>', 'Project root; files outside it go to _outside/')
  .addOption(sequencesOption())
  .option('--rewrite', 'Rewrite stored paths so the packed scene finds its files')
  .option('--zip', 'Write a ZIP archive instead of a directory')
  .option('--dry-run', 'Plan and check every file without writing anything')
  .option('--exclude <glob...>', 'Leave out files matching these patterns')
  .option('--relative-only', 'Leave out files stored with an absolute path')
  .option('--pre-traced <json>', 'Use references written by "trace --json" instead of tracing')
  .option('--manifest <file>', 'Optional path to save the pack manifest')
  .option('--concurrency <n>', 'Number of files copied at the same time', parsePositiveInt)
  .action(async (scene: string, target: string, options: PackCommandOptions) => {
    try {
      const config = configWith(loadConfig(), options.concurrency);
      const logger = createConsoleLogger(config.logLevel);
      const preTraced = options.preTraced ? referencesFromJson(await readFile(resolve(options.preTraced), 'utf8')) : undefined;

      console.log(`Packing scene: ${scene}`);
      console.log(`Output will be written to: ${target}`);
      console.log('');

      const packer = new Packer({
        sceneFile: resolve(scene),
        projectRoot: resolve(options.project),
        target: resolve(target),
        expandSequences: options.sequences === 'expand',
        rewrite: options.rewrite ?? false,
        archive: options.zip ?? false,
        preTraced,
        exclude: options.exclude,
        relativeOnly: options.relativeOnly ?? false,
        noop: options.dryRun ?? false,
        config,
        logger,
      });
      const interrupt = (): void => packer.abort('interrupted');
      process.once('SIGINT', interrupt);

      const plan = await packer.strategise();
      const result = await packer.execute(plan);
      process.off('SIGINT', interrupt);

      if (options.manifest) {
        await writeFile(resolve(options.manifest), manifestJson(plan), 'utf8');
      }

      for (const path of result.missing) {
        console.log(`⚠️  Missing: ${path}`);
      }
      for (const [path, reason] of Object.entries(result.unreadable)) {
        console.log(`⚠️  Unreadable: ${path} (${reason})`);
      }
      for (const [path, reason] of Object.entries(result.failures)) {
        console.log(`⚠️  Failed: ${path} (${reason})`);
      }

      console.log('');
      if (result.aborted) {
        console.error(`❌ Pack aborted: ${result.abortReason ?? ''}`);
        process.exit(1);
      }
      console.log(`✅ Pack completed: ${result.manifest.length} files${result.archivePath ? ` in ${result.archivePath}` : ''}`);
    } catch (error) {
      console.error('❌ Pack failed:', message(error));
      process.exit(1);
    }
  });

await program.parseAsync();
