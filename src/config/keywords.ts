/**
 * Keyword lists for candidate screening
 */

export const BLOCKED_KEYWORDS = {
  recruiting: [
    'hiring',
    'we are hiring',
    'job opening',
    'job opportunity',
    'vacancy',
    'vaga',
    'vagas',
    'contratando',
    'oportunidade de emprego',
  ],

  promotions: [
    'sale',
    'discount',
    'promo',
    'promotion',
    'black friday',
    'buy now',
    'compre agora',
    'promoção',
    'desconto',
  ],

  consumerDeals: [
    'iphone',
    'samsung galaxy',
    'smartphone deals',
  ],
} as const;

export type BlockedCategory = keyof typeof BLOCKED_KEYWORDS;

export const BLOCKED_CATEGORIES: readonly BlockedCategory[] = ['recruiting', 'promotions', 'consumerDeals'];
