/**
 * Rule Catalog Loader
 *
 * Loads rule definitions from YAML files. The built-in rules ship in the
 * package's `rules/` directory; extra directories are appended after them.
 * Every problem is reported as a CatalogError before any analysis runs.
 */

import { readFile, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve, dirname, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { SUPPORTED_LANGUAGES, type SupportedLanguage } from '../language/classifier.js';
import { HEURISTICS } from './heuristics.js';
import { RuleCatalog } from './catalog.js';
import type { Matcher, Rule } from './types.js';
import { CATEGORIES, CatalogError, SEVERITIES } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Rules bundled with the package
 */
export const BUILTIN_RULES_DIR = join(__dirname, '..', '..', 'rules');

const RULE_FILE_EXTENSIONS = ['.yaml', '.yml'];

/** Lines on each side a heuristic sees unless the rule says otherwise */
const DEFAULT_WINDOW = 10;

const LanguageListSchema = z.array(z.enum(SUPPORTED_LANGUAGES)).nonempty();

const RuleSchema = z
  .object({
    id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be kebab-case'),
    languages: LanguageListSchema.optional(),
    category: z.enum(CATEGORIES),
    severity: z.enum(SEVERITIES),
    owasp: z
      .string()
      .regex(/^A(0[1-9]|10)$/, 'must be an OWASP Top-10 id such as A03')
      .optional(),
    title: z.string().min(1),
    description: z.string().min(1),
    suggestion: z.string().min(1),
    pattern: z.string().min(1).optional(),
    flags: z
      .string()
      .regex(/^[imsu]*$/, 'only i, m, s and u are allowed')
      .optional(),
    heuristic: z.string().optional(),
    window: z.number().int().min(1).max(500).optional(),
  })
  .strict()
  .refine((rule) => (rule.pattern === undefined) !== (rule.heuristic === undefined), {
    message: 'a rule needs exactly one of pattern or heuristic',
  });

const RuleFileSchema = z
  .object({
    languages: z.union([z.literal('generic'), LanguageListSchema]),
    rules: z.array(RuleSchema),
  })
  .strict();

export type RuleDefinition = z.infer<typeof RuleSchema>;

export type RuleFile = z.infer<typeof RuleFileSchema>;

export interface CatalogLoaderOptions {
  /** Additional rule directories, loaded after the built-in rules */
  rulesDirs?: string[];
  /** Load BUILTIN_RULES_DIR (default: true) */
  includeBuiltin?: boolean;
  /** Enable verbose logging */
  verbose?: boolean;
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Build the matcher for a validated rule definition
 */
function compileMatcher(definition: RuleDefinition, source: string): Matcher {
  if (definition.pattern !== undefined) {
    try {
      return { kind: 'pattern', regex: new RegExp(definition.pattern, definition.flags ?? '') };
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CatalogError(
        `Rule "${definition.id}" in ${source}: invalid pattern (${reason})`,
        'INVALID_PATTERN',
        source
      );
    }
  }

  const name = definition.heuristic ?? '';
  const test = HEURISTICS.get(name);
  if (test === undefined) {
    throw new CatalogError(
      `Rule "${definition.id}" in ${source}: unknown heuristic "${name}"`,
      'UNKNOWN_HEURISTIC',
      source
    );
  }
  return { kind: 'window', heuristic: name, radius: definition.window ?? DEFAULT_WINDOW, test };
}

/**
 * Turn a validated definition into an immutable Rule
 */
export function compileRule(
  definition: RuleDefinition,
  fileLanguages: readonly SupportedLanguage[] | 'generic',
  source: string
): Rule {
  const rule: Rule = {
    id: definition.id,
    languages: definition.languages ?? fileLanguages,
    category: definition.category,
    severity: definition.severity,
    owasp: definition.owasp,
    title: definition.title,
    description: definition.description,
    suggestion: definition.suggestion,
    matcher: compileMatcher(definition, source),
    source,
  };
  return Object.freeze(rule);
}

/**
 * Parse and validate one rule file's content
 */
export function parseRuleFile(content: string, source: string): Rule[] {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`Failed to parse ${source}: ${reason}`, 'INVALID_RULE', source);
  }

  const result = RuleFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new CatalogError(`Invalid rule file ${source}: ${formatZodIssues(result.error)}`, 'INVALID_RULE', source);
  }

  return result.data.rules.map((definition) => compileRule(definition, result.data.languages, source));
}

/**
 * Load every rule file in a directory, in file name order
 */
export async function loadRulesFromDirectory(dirPath: string, verbose = false): Promise<Rule[]> {
  const resolvedPath = resolve(dirPath);

  let names: string[];
  try {
    names = await readdir(resolvedPath);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`Cannot read rules directory ${resolvedPath}: ${reason}`, 'READ_FAILED', resolvedPath);
  }

  const files = names.filter((name) => RULE_FILE_EXTENSIONS.includes(extname(name).toLowerCase())).sort();

  const rules: Rule[] = [];
  for (const name of files) {
    const filePath = join(resolvedPath, name);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CatalogError(`Cannot read ${filePath}: ${reason}`, 'READ_FAILED', filePath);
    }

    const fileRules = parseRuleFile(content, filePath);
    if (verbose) {
      console.error(`[Catalog] Loaded ${fileRules.length} rules from: ${filePath}`);
    }
    rules.push(...fileRules);
  }

  return rules;
}

/**
 * Load the built-in rules plus any extra directories into a frozen catalog
 *
 * @throws {CatalogError} On duplicate ids, malformed patterns or invalid files
 */
export async function loadCatalog(options: CatalogLoaderOptions = {}): Promise<RuleCatalog> {
  const { rulesDirs = [], includeBuiltin = true, verbose = false } = options;

  const dirs = includeBuiltin ? [BUILTIN_RULES_DIR, ...rulesDirs] : [...rulesDirs];
  const rules: Rule[] = [];

  for (const dir of dirs) {
    if (!existsSync(dir)) {
      throw new CatalogError(`Rules directory not found: ${resolve(dir)}`, 'READ_FAILED', dir);
    }
    rules.push(...(await loadRulesFromDirectory(dir, verbose)));
  }

  const catalog = new RuleCatalog(rules);
  if (verbose) {
    console.error(`[Catalog] ${catalog.size} rules from ${dirs.length} director${dirs.length === 1 ? 'y' : 'ies'}`);
  }
  return catalog;
}
