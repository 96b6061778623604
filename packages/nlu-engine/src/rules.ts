import type { CatalogWarning, IntentCatalog, PatternFlag } from '@campus-assist/knowledge-catalog';

export interface IntentRule {
  label: string;
  pattern: RegExp;
}

const FLAG_LETTERS: Record<PatternFlag, string> = {
  IGNORECASE: 'i',
  MULTILINE: 'm',
  DOTALL: 's',
};

export function compilePattern(regex: string, flags: readonly PatternFlag[]): RegExp {
  const letters = [...new Set(flags.map((flag) => FLAG_LETTERS[flag]))].join('');
  return new RegExp(regex, letters);
}

/**
 * Flattens the catalog into the ordered rule list the resolver scans. A pattern
 * that is not a valid regular expression is dropped with a warning.
 */
export function compileIntentRules(
  catalog: IntentCatalog,
  source = '.campus-assist/intents.yaml',
): { rules: IntentRule[]; warnings: CatalogWarning[] } {
  const rules: IntentRule[] = [];
  const warnings: CatalogWarning[] = [];

  catalog.intents.forEach((definition, index) => {
    definition.patterns.forEach((pattern, patternIndex) => {
      try {
        rules.push({ label: definition.intent, pattern: compilePattern(pattern.regex, pattern.flags) });
      } catch (error) {
        warnings.push({
          filePath: source,
          entry: `intents[${index}].patterns[${patternIndex}]`,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    });
  });

  return { rules, warnings };
}

export function distinctLabels(rules: readonly IntentRule[]): string[] {
  return [...new Set(rules.map((rule) => rule.label))];
}
