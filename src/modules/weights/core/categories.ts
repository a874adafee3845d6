/**
 * The twelve COICOP divisions both weight sources publish.
 *
 * ONS series codes are the canonical code space; Eurostat COICOP codes are
 * translated into them so rows from both sources join on `code`.
 */

export interface CategoryDefinition {
  /** ONS series code, e.g. 'CHZR' */
  code: string;
  /** Eurostat COICOP code, e.g. 'CP01' */
  coicop: string;
  /** ONS-style description with the division number prefix */
  description: string;
}

export const CATEGORIES: readonly CategoryDefinition[] = [
  { code: 'CHZR', coicop: 'CP01', description: '01    Food and non-alcoholic beverages' },
  { code: 'CHZS', coicop: 'CP02', description: '02    Alcoholic beverages and tobacco' },
  { code: 'CHZT', coicop: 'CP03', description: '03    Clothing and footwear' },
  {
    code: 'CHZU',
    coicop: 'CP04',
    description: '04    Housing, water, electricity, gas and other fuels',
  },
  {
    code: 'CHZV',
    coicop: 'CP05',
    description: '05    Furniture, household equipment and maintenance',
  },
  { code: 'CHZW', coicop: 'CP06', description: '06    Health' },
  { code: 'CHZX', coicop: 'CP07', description: '07    Transport' },
  { code: 'CHZY', coicop: 'CP08', description: '08    Communication' },
  { code: 'CHZZ', coicop: 'CP09', description: '09    Recreation and culture' },
  { code: 'CJUU', coicop: 'CP10', description: '10    Education' },
  { code: 'CJUV', coicop: 'CP11', description: '11    Restaurants and hotels' },
  { code: 'CJUW', coicop: 'CP12', description: '12    Miscellaneous goods and services' },
];

export const CANONICAL_CATEGORY_COUNT = CATEGORIES.length;

export const CANONICAL_CATEGORY_CODES: ReadonlySet<string> = new Set(CATEGORIES.map((c) => c.code));

/** Leading code token of the "all items" row in ONS weight tables */
export const OVERALL_INDEX_CODE = 'CHZQ';

const BY_COICOP = new Map(CATEGORIES.map((c) => [c.coicop, c]));

export const findCategoryByCoicop = (coicop: string): CategoryDefinition | undefined =>
  BY_COICOP.get(coicop);
