import { AmbiguousLanguagePairError, UnavailableLanguageError } from './errors';
import { LanguagePair } from './types';

/**
 * Pick the (source, target) pair to convert.
 *
 * Explicit hints must name declared languages. Anything missing is only
 * inferred when the document declares exactly two languages.
 */
export function resolveLanguagePair(
  available: readonly string[],
  from?: string,
  to?: string
): LanguagePair {
  if (from && !available.includes(from)) throw new UnavailableLanguageError(from);
  if (to && !available.includes(to)) throw new UnavailableLanguageError(to);

  const languages = [...new Set(available)];

  if (from && to) {
    if (from === to) throw new AmbiguousLanguagePairError(languages);
    return { source: from, target: to };
  }

  if (languages.length === 2) {
    const [first, second] = languages;
    let source = from;
    let target = to;

    if (source) target = languages.find((lang) => lang !== source);
    else if (target) source = languages.find((lang) => lang !== target);
    else {
      source = first;
      target = second;
    }

    if (source && target && source !== target) return { source, target };
  }

  throw new AmbiguousLanguagePairError(languages);
}
