export const BUSINESS_CATEGORIES = [
  'restaurant',
  'cafe',
  'bar',
  'bakery',
  'grocery',
  'retail',
  'health',
  'beauty',
  'fitness',
  'automotive',
  'services',
  'entertainment',
  'lodging',
  'other',
] as const;

export type BusinessCategory = (typeof BUSINESS_CATEGORIES)[number];

/**
 * Keywords matched (case-insensitive, substring) against directory category
 * labels. Order matters: the first category with a matching keyword wins,
 * so narrower categories come before broader ones.
 */
const CATEGORY_KEYWORDS: ReadonlyArray<[BusinessCategory, readonly string[]]> = [
  ['cafe', ['coffee', 'café', 'cafe', 'tea room']],
  ['bakery', ['bakery', 'pastry', 'donut', 'dessert']],
  ['beauty', ['salon', 'barber', 'spa', 'nail', 'beauty']],
  ['bar', ['bar', 'pub', 'brewery', 'nightclub', 'lounge']],
  ['restaurant', ['restaurant', 'diner', 'pizz', 'food', 'grill', 'bistro']],
  ['grocery', ['grocery', 'supermarket', 'market', 'convenience']],
  ['fitness', ['gym', 'fitness', 'yoga', 'pilates', 'martial arts']],
  ['health', ['doctor', 'dentist', 'pharmacy', 'clinic', 'medical', 'veterinar']],
  ['automotive', ['auto', 'car wash', 'gas station', 'mechanic', 'tire']],
  ['lodging', ['hotel', 'motel', 'hostel', 'bed and breakfast']],
  ['entertainment', ['theater', 'cinema', 'museum', 'bowling', 'arcade', 'music venue']],
  ['retail', ['store', 'shop', 'boutique', 'retail']],
  ['services', ['service', 'repair', 'laundry', 'bank', 'office']],
];

export function isBusinessCategory(value: string): value is BusinessCategory {
  return (BUSINESS_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Map raw directory category labels onto one of the tracked categories.
 */
export function classifyCategory(labels: readonly string[]): BusinessCategory {
  const lowered = labels.map((label) => label.toLowerCase());
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (lowered.some((label) => keywords.some((keyword) => label.includes(keyword)))) {
      return category;
    }
  }
  return 'other';
}
