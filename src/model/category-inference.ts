export type CategoryInference = {
  scores: Record<string, number>;
  selected_categories: string[];
};

export const FALLBACK_CATEGORY = "Miscellaneous";

const CATEGORY_KEYWORDS: Record<string, readonly string[]> = {
  CPM: [
    "cellular potts",
    "cpm",
    "adhesion",
    "contact energy",
    "volume constraint",
    "surface constraint",
    "cell sorting"
  ],
  PDE: [
    "reaction-diffusion",
    "diffusion equation",
    "chemotaxis",
    "morphogen",
    "concentration field",
    "gradient"
  ],
  ODE: [
    "ordinary differential equation",
    "ode",
    "kinetic model",
    "rate equation",
    "temporal dynamics"
  ],
  Multiscale: [
    "multiscale",
    "coupled model",
    "hybrid model",
    "cell-field interaction",
    "feedback loop"
  ]
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// Word boundaries keep short keywords such as "ode" from matching inside "model".
const keywordPattern = (keyword: string): RegExp =>
  new RegExp(`(^|[^a-z0-9])${escapeRegExp(keyword)}($|[^a-z0-9])`);

/**
 * Scores each category by how many of its keywords occur in the text and
 * selects every category with a positive score, restricted to `available`.
 */
export const inferReferenceCategories = (
  text: string,
  available: readonly string[] = [...Object.keys(CATEGORY_KEYWORDS), FALLBACK_CATEGORY]
): CategoryInference => {
  const lowered = text.toLowerCase();
  const scores: Record<string, number> = {};
  for (const [category, keywords] of Object.entries(CATEGORY_KEYWORDS)) {
    scores[category] = keywords.filter((keyword) => keywordPattern(keyword).test(lowered)).length;
  }

  const selected = Object.entries(scores)
    .filter(([category, score]) => score > 0 && available.includes(category))
    .map(([category]) => category);

  return {
    scores,
    selected_categories: selected.length > 0 ? selected : [FALLBACK_CATEGORY]
  };
};
