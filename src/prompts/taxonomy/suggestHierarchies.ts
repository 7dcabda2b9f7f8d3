/**
 * Hierarchy suggestion for species names the taxonomy could not match.
 *
 * The model returns several candidate identifications per term, each with
 * a full class/order/family/genus/species hierarchy, so the resolver can
 * fall back to a coarser rank when the species itself is absent.
 */

import { DEFAULT_LLM_MODEL } from '../../config/constants';
import type { PromptDefinition } from '../types';

interface SuggestHierarchiesInput {
  terms: string[];
  location?: string;
}

export const suggestHierarchiesPrompt: PromptDefinition<SuggestHierarchiesInput> = {
  id: 'suggest-taxon-hierarchies',
  version: 2,
  model: DEFAULT_LLM_MODEL,
  description: 'Suggest ranked candidate taxonomic hierarchies for free-form species names',

  build: ({ terms, location }) => {
    const lines = [
      'Map the following biological terms to their standard scientific (Latin) name and Common name.',
    ];

    if (location) {
      lines.push(`Context: The species are observed in ${location}.`);
    }

    lines.push(
      'For each term, provide multiple candidate identifications in order of likelihood, as different taxonomies may use different names.',
      'For each candidate, include the full taxonomic hierarchy (class, order, family, genus, species).',
      'Return the result as a JSON list of objects with keys:',
      "  - 'input_text': the original input, exactly as given",
      "  - 'candidates': array of candidate objects, each with:",
      "      - 'class': taxonomic class",
      "      - 'order': taxonomic order",
      "      - 'family': taxonomic family",
      "      - 'genus': taxonomic genus",
      "      - 'species': species epithet (not the full binomial, just the species part)",
      "      - 'confidence': your confidence in this candidate, between 0 and 1",
      "  - 'suggested_common': the most common English name",
      'Leave a rank empty if you are unsure of it.',
      'If you cannot identify a term, set candidates to an empty array.',
      'Items:',
      ...terms.map((term) => `- ${term}`),
    );

    return lines.join('\n');
  },
};
