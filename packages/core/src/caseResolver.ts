// glyphproof/caseResolver - Case-aware glyph filtering with the `any` fallback cascade

import { CASE_RULES, caseGlyphs, missingGlyphClass, type CaseGlyphs } from './caseModes.js';
import { ConfigurationError, NoMatchError } from './errors.js';
import { GlyphSet } from './glyphs.js';
import { dp } from './log.js';
import type { WordTable } from './wordTable.js';
import type { CaseMode, FilteredCollection, GlyphsInput, WordCount } from './types.js';

type ExplicitMode = Exclude<CaseMode, 'any'>;

/** Post-processing applied to each stage, e.g. structural criteria */
export type StageRefinement = (collection: FilteredCollection) => FilteredCollection;

const identity: StageRefinement = collection => collection;

/** Fallback order for `any`: untouched words, then capitalized, then uppercased */
export const ANY_CASCADE: readonly ExplicitMode[] = ['any_og', 'cap', 'uc'];

interface Stage {
  entries: WordCount[];
  /** Source table position of each produced entry */
  sources: Map<WordCount, number>;
}

function runRule(table: WordTable, glyphs: CaseGlyphs, mode: ExplicitMode): Stage {
  const rule = CASE_RULES[mode];
  const entries: WordCount[] = [];
  const sources = new Map<WordCount, number>();

  table.entries.forEach(([word, count], index) => {
    const accepted = glyphs.all.limited
      ? rule.acceptsWithGlyphs(word, glyphs)
      : rule.acceptsUnconstrained(word);
    if (!accepted) return;

    const cased = rule.transform ? rule.transform(word) : word;
    // Transforms like ß -> SS can leave the glyph set
    if (cased !== word && !glyphs.all.spells(cased)) return;

    const entry: WordCount = [cased, count];
    entries.push(entry);
    sources.set(entry, index);
  });

  return { entries, sources };
}

function describe(mode: CaseMode, glyphs: GlyphSet): string {
  return glyphs.limited ? `case='${mode}', glyphs='${glyphs.key}'` : `case='${mode}'`;
}

/**
 * Filter one explicit mode, then refine. Throws ConfigurationError when
 * the glyphs lack a letter class the mode needs.
 */
function resolveExplicit(
  table: WordTable,
  glyphs: CaseGlyphs,
  mode: ExplicitMode,
  refine: StageRefinement
): Stage {
  const missing = missingGlyphClass(CASE_RULES[mode], glyphs);
  if (missing) {
    throw new ConfigurationError(`case='${mode}' but no ${missing} glyphs found`);
  }

  const stage = runRule(table, glyphs, mode);
  if (stage.entries.length === 0) {
    throw new NoMatchError('case', describe(mode, glyphs.all));
  }

  const refined = refine(stage.entries);
  return { entries: [...refined], sources: stage.sources };
}

function resolveCascade(
  table: WordTable,
  glyphs: CaseGlyphs,
  minimumResults: number,
  refine: StageRefinement
): FilteredCollection {
  const seen = new Set<number>();
  const union: WordCount[] = [];
  let stagesUsed = 0;

  for (const mode of ANY_CASCADE) {
    if (union.length >= minimumResults) break;

    const missing = missingGlyphClass(CASE_RULES[mode], glyphs);
    if (missing) {
      dp(`any: skipping case='${mode}', no ${missing} glyphs`);
      continue;
    }

    let stage: Stage;
    try {
      stage = resolveExplicit(table, glyphs, mode, refine);
    } catch (error) {
      if (error instanceof NoMatchError) {
        dp(`any: case='${mode}' gave nothing (${error.message})`);
        continue;
      }
      throw error;
    }

    let added = 0;
    for (const entry of stage.entries) {
      const source = stage.sources.get(entry);
      if (source !== undefined) {
        if (seen.has(source)) continue;
        seen.add(source);
      }
      union.push(entry);
      added++;
    }
    if (added > 0) stagesUsed++;
  }

  if (union.length === 0) {
    throw new NoMatchError('case', describe('any', glyphs.all));
  }

  // Array.prototype.sort is stable, so ties keep stage order
  return stagesUsed > 1 ? union.sort((a, b) => b[1] - a[1]) : union;
}

/**
 * Filter a table down to the words displayable with `glyphs` in the
 * requested case. `refine` runs on each stage's output before the
 * `any` cascade decides whether to fall back further.
 */
export function resolveCaseWith(
  table: WordTable,
  glyphs: GlyphsInput | GlyphSet,
  mode: CaseMode,
  minimumResults: number,
  refine: StageRefinement
): FilteredCollection {
  const glyphSet = GlyphSet.from(glyphs);
  const classes = caseGlyphs(glyphSet);

  // Case only matters for scripts with upper and lower case
  if (!table.bicameral) {
    return resolveExplicit(table, classes, 'any_og', refine).entries;
  }

  if (mode !== 'any') {
    return resolveExplicit(table, classes, mode, refine).entries;
  }

  if (!glyphSet.limited) {
    return resolveExplicit(table, classes, 'any_og', refine).entries;
  }

  return resolveCascade(table, classes, Math.max(1, minimumResults), refine);
}

export function resolveCase(
  table: WordTable,
  glyphs: GlyphsInput | GlyphSet,
  mode: CaseMode,
  minimumResults = 1
): FilteredCollection {
  return resolveCaseWith(table, glyphs, mode, minimumResults, identity);
}
