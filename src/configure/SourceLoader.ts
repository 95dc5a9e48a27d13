/**
 * Source Loader & Merger
 *
 * Reads one YAML file or every *.yml / *.yaml file of a directory, validates
 * each against the source schema, applies defaults, and merges the results
 * into a single package list with one effective deployment prefix.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { getLogger } from '../logging/index.js';
import { applyDefaults } from './defaults.js';
import { SourceLoadError, errorMessage } from './errors.js';
import { PlaceholderResolver } from './PlaceholderResolver.js';
import { RawConfigurationSchema, formatIssues } from './schema.js';
import type { RawConfiguration } from './schema.js';
import type { Configuration, ConfigurationSource, MergedConfiguration, Package } from './types.js';

const logger = getLogger('configure.loader');

const SOURCE_EXTENSIONS = ['.yml', '.yaml'];

export function isSourceFile(fileName: string): boolean {
  return SOURCE_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

function resolvePlaceholders(raw: RawConfiguration, resolver: PlaceholderResolver): RawConfiguration {
  const unresolved = new Set<string>();

  const packages = raw.packages?.map((pkg) => ({
    ...pkg,
    artifacts: pkg.artifacts?.map((artifact) => ({
      ...artifact,
      parameters: artifact.parameters?.map((param) => {
        const result = resolver.resolve(param.value);
        result.unresolvedVars.forEach((name) => unresolved.add(name));
        return { key: param.key, value: result.resolved };
      }),
    })),
  }));

  if (unresolved.size > 0) {
    throw new Error(`Unresolved placeholders: ${[...unresolved].join(', ')}`);
  }

  return { ...raw, packages };
}

/**
 * Parse the text of one source file into the defaulted model.
 * Throws SourceLoadError on YAML syntax, schema or placeholder errors.
 */
export function parseSource(
  content: string,
  fileName: string,
  resolver: PlaceholderResolver = new PlaceholderResolver()
): Configuration {
  let document: unknown;
  try {
    document = yaml.load(content, { filename: fileName });
  } catch (error) {
    throw new SourceLoadError(`Failed to parse YAML in ${fileName}: ${errorMessage(error)}`, fileName);
  }

  // An empty file is an empty configuration
  const parsed = RawConfigurationSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new SourceLoadError(
      `Invalid configuration in ${fileName}:\n  ${formatIssues(parsed.error).join('\n  ')}`,
      fileName
    );
  }

  let raw: RawConfiguration;
  try {
    raw = resolvePlaceholders(parsed.data, resolver);
  } catch (error) {
    throw new SourceLoadError(`Invalid configuration in ${fileName}: ${errorMessage(error)}`, fileName);
  }

  return applyDefaults(raw);
}

async function loadFile(filePath: string, resolver: PlaceholderResolver): Promise<ConfigurationSource> {
  const fileName = path.basename(filePath);
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SourceLoadError(`Failed to read ${filePath}: ${errorMessage(error)}`, filePath);
  }
  return { config: parseSource(content, fileName, resolver), source: filePath, fileName };
}

async function loadDirectory(dirPath: string, resolver: PlaceholderResolver): Promise<ConfigurationSource[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const names = entries
    .filter((entry) => !entry.isDirectory() && isSourceFile(entry.name))
    .map((entry) => entry.name)
    .sort();

  const sources: ConfigurationSource[] = [];
  for (const name of names) {
    try {
      sources.push(await loadFile(path.join(dirPath, name), resolver));
    } catch (error) {
      logger.warn(`Skipping configuration file ${name}: ${errorMessage(error)}`);
    }
  }

  if (sources.length === 0) {
    throw new SourceLoadError(`No valid configuration files found in folder: ${dirPath}`, dirPath);
  }

  logger.info(`Loaded ${sources.length} configuration file(s) from folder`);
  return sources;
}

/**
 * Load sources from a file or a directory.
 *
 * A single file must parse. In a directory, files that fail are logged and
 * skipped; at least one must succeed.
 */
export async function loadSources(
  sourcePath: string,
  resolver: PlaceholderResolver = new PlaceholderResolver()
): Promise<ConfigurationSource[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(sourcePath);
  } catch (error) {
    throw new SourceLoadError(`Failed to access path ${sourcePath}: ${errorMessage(error)}`, sourcePath);
  }

  if (stat.isDirectory()) {
    return loadDirectory(sourcePath, resolver);
  }
  return [await loadFile(sourcePath, resolver)];
}

/**
 * Concatenate package lists in discovery order. Duplicate ids are kept.
 *
 * Prefix: the override when non-empty, else the first source's declared
 * prefix, else empty.
 */
export function mergeSources(sources: readonly ConfigurationSource[], overridePrefix?: string): MergedConfiguration {
  const packages: Package[] = [];
  for (const source of sources) {
    logger.info(`  Merging packages from: ${source.fileName}`);
    packages.push(...source.config.packages);
  }

  const deploymentPrefix = overridePrefix || sources[0]?.config.deploymentPrefix || '';

  return { deploymentPrefix, packages };
}
