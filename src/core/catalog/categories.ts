/**
 * Display order of the catalog tabs
 */
export const CATEGORY_ORDER = [
  'General',
  'Format Conversion',
  'Style',
  'Professional',
  'Academic',
  'Creative',
  'Technical',
  'Social Media',
  'Prompting',
  'Other',
] as const;

export type CategoryName = (typeof CATEGORY_ORDER)[number];

/**
 * Keyword rules checked in order against the lower-cased name and
 * description; the first rule with a matching substring wins.
 */
export const CATEGORY_RULES: ReadonlyArray<{ category: CategoryName; keywords: readonly string[] }> = [
  { category: 'General', keywords: ['cleanup', 'extract', 'anonymization', 'bullet', 'summary'] },
  {
    category: 'Professional',
    keywords: ['email', 'letter', 'minutes', 'documentation', 'status', 'responder'],
  },
  { category: 'Academic', keywords: ['academic', 'scientific', 'paper'] },
  { category: 'Social Media', keywords: ['blog', 'social', 'media'] },
  { category: 'Creative', keywords: ['poetry', 'poem', 'shakespeare', 'tolkien', 'creative'] },
  { category: 'Technical', keywords: ['code', 'technical', 'development', 'software'] },
  { category: 'Format Conversion', keywords: ['format', 'convert', 'transform'] },
  { category: 'Style', keywords: ['tone', 'style', 'formal', 'casual'] },
  { category: 'Prompting', keywords: ['prompt', 'chatgpt', 'ai'] },
];

export function categoryFor(name: string, description: string): CategoryName {
  const haystacks = [name.toLowerCase(), description.toLowerCase()];
  const rule = CATEGORY_RULES.find(({ keywords }) =>
    keywords.some((word) => haystacks.some((text) => text.includes(word)))
  );
  return rule ? rule.category : 'Other';
}
