/**
 * Language classification by file extension
 */

/**
 * Languages the rule catalog knows about.
 * `unknown` files still receive the generic rules.
 */
export type Language = 'rust' | 'javascript' | 'typescript' | 'python' | 'unknown';

/**
 * Languages that can carry language-specific rules
 */
export const SUPPORTED_LANGUAGES = ['rust', 'javascript', 'typescript', 'python'] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

const EXTENSION_MAP: ReadonlyMap<string, SupportedLanguage> = new Map<string, SupportedLanguage>([
  ['rs', 'rust'],
  ['js', 'javascript'],
  ['mjs', 'javascript'],
  ['cjs', 'javascript'],
  ['jsx', 'javascript'],
  ['ts', 'typescript'],
  ['tsx', 'typescript'],
  ['mts', 'typescript'],
  ['cts', 'typescript'],
  ['py', 'python'],
  ['pyw', 'python'],
  ['pyi', 'python'],
]);

/**
 * Map a file path to its language.
 *
 * Only the final extension of the base name is considered and matching is
 * case-insensitive. Dotfiles (`.env`) and names without an extension are
 * `unknown`.
 */
export function classifyLanguage(path: string): Language {
  const baseName = path.split(/[\\/]/).pop() ?? '';
  const dot = baseName.lastIndexOf('.');
  if (dot <= 0 || dot === baseName.length - 1) {
    return 'unknown';
  }

  return EXTENSION_MAP.get(baseName.slice(dot + 1).toLowerCase()) ?? 'unknown';
}

export function isSupportedLanguage(value: string): value is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((lang) => lang === value);
}
