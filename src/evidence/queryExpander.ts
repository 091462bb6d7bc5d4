import { createLogger } from "../logger.js";
import { loadVocabulary, type MedicalVocabulary } from "./vocabulary.js";

const log = createLogger("query-expander");

export interface ExpandOptions {
  domain?: string;
  maxTerms?: number;
  includeSynonyms?: boolean;
  includeDomainKeywords?: boolean;
  includeAcronyms?: boolean;
}

const STRUCTURAL_SUFFIXES = ["receptor", "pathway", "signaling"];
const DISEASE_SUFFIXES = ["disease", "syndrome", "disorder", "condition"];

/** Case-insensitive dedupe; the first spelling seen is kept. */
export function dedupeTerms(terms: Iterable<string>): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const term of terms) {
    const key = term.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(term);
    }
  }
  return unique;
}

function stripPunctuation(word: string): string {
  return word.replace(/^[.,;:]+|[.,;:]+$/g, "");
}

/** `<w> receptor`, `<w> pathway`, `<w> signaling`, then `<w> disease` and its kin. */
export function extractMedicalConcepts(query: string): string[] {
  const lower = query.toLowerCase();
  const concepts: string[] = [];

  for (const suffix of [...STRUCTURAL_SUFFIXES, ...DISEASE_SUFFIXES]) {
    const pattern = new RegExp(`(\\w+)\\s+${suffix}`, "g");
    for (const match of lower.matchAll(pattern)) {
      concepts.push(`${match[1]} ${suffix}`);
    }
  }

  return concepts;
}

export class QueryExpander {
  private readonly vocabulary: MedicalVocabulary;

  constructor(vocabulary: MedicalVocabulary = loadVocabulary()) {
    this.vocabulary = vocabulary;
  }

  expand(query: string, options: ExpandOptions = {}): string[] {
    const {
      domain,
      maxTerms = 10,
      includeSynonyms = true,
      includeDomainKeywords = true,
      includeAcronyms = true,
    } = options;
    const lower = query.toLowerCase();
    const terms: string[] = [query];

    if (includeSynonyms) {
      for (const [base, synonyms] of Object.entries(this.vocabulary.synonyms)) {
        if (lower.includes(base)) {
          terms.push(...synonyms.slice(0, 3));
        }
      }
    }

    if (includeDomainKeywords && domain) {
      const keywords = this.vocabulary.domainKeywords[domain.toLowerCase()] ?? [];
      for (const keyword of keywords.slice(0, 5)) {
        if (lower.includes(keyword.toLowerCase())) {
          terms.push(keyword);
        }
      }
    }

    if (includeAcronyms) {
      for (const word of query.split(/\s+/)) {
        const expansion = this.vocabulary.acronyms[stripPunctuation(word.toUpperCase())];
        if (expansion) {
          terms.push(expansion);
        }
      }
    }

    terms.push(...extractMedicalConcepts(query).slice(0, 3));

    const result = dedupeTerms(terms).slice(0, maxTerms);
    log.debug("Expanded query", { query, terms: result.length });
    return result;
  }
}
