import type {
  CategoryDefinition,
  LanguageDefinition,
  QuotaSlot,
  RepoSpec,
  Rng,
  SynthConfig,
} from "../core/index.js";
import { formatRepoName } from "../core/index.js";
import { ContributorPool } from "./contributors.js";

export interface SelectionRanges {
  lines: readonly [number, number];
  commits: readonly [number, number];
  maxContributors: number;
}

export interface SpecSelectorOptions {
  categories: readonly CategoryDefinition[];
  languages: readonly LanguageDefinition[];
  pool: ContributorPool;
  ranges: SelectionRanges;
}

/**
 * Walk the category table in declaration order, one slot per quota unit.
 * Templates rotate round-robin within each category.
 */
export function* iterateQuotaSlots(
  categories: readonly CategoryDefinition[],
): Generator<QuotaSlot> {
  for (const category of categories) {
    for (let ordinal = 0; ordinal < category.count; ordinal += 1) {
      yield {
        category: category.name,
        template: category.templates[ordinal % category.templates.length],
        ordinal,
      };
    }
  }
}

export function pickLanguage(languages: readonly LanguageDefinition[], rng: Rng): string {
  const index = rng.weightedIndex(languages.map((language) => language.weight));
  return languages[index].name;
}

export class SpecSelector {
  private readonly options: SpecSelectorOptions;

  public constructor(options: SpecSelectorOptions) {
    this.options = options;
  }

  public static fromConfig(config: SynthConfig): SpecSelector {
    return new SpecSelector({
      categories: config.categories,
      languages: config.languages,
      pool: new ContributorPool(config.contributors),
      ranges: config.ranges,
    });
  }

  public slots(): Generator<QuotaSlot> {
    return iterateQuotaSlots(this.options.categories);
  }

  public quotaTotal(): number {
    return this.options.categories.reduce((sum, category) => sum + category.count, 0);
  }

  /** Never fails: any slot and id produce a spec. */
  public select(slot: QuotaSlot, id: number, rng: Rng): RepoSpec {
    const { languages, pool, ranges } = this.options;

    const language = pickLanguage(languages, rng);
    const targetLines = rng.int(ranges.lines[0], ranges.lines[1]);
    const targetCommits = rng.int(ranges.commits[0], ranges.commits[1]);
    const contributors = pool.draw(rng, ranges.maxContributors);

    return Object.freeze({
      id,
      name: formatRepoName(id, slot.template),
      category: slot.category,
      template: slot.template,
      language,
      targetLines,
      targetCommits,
      contributorCount: contributors.length,
      contributors: Object.freeze(contributors),
    });
  }
}
