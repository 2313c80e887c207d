/**
 * Column name resolution shared by the upload validator and the output reader
 */

/** Canonical identifier column name used in exports */
export const CANONICAL_ID_COLUMN = 'customerID';

/** Accepted identifier headers, in priority order */
export const ID_COLUMN_ALIASES: readonly string[] = [
  'customerID',
  'customer_id',
  'id',
  'customer_pk',
  'user_id',
  'client_id',
];

/** Accepted probability headers in a scoring artifact, in priority order */
export const PROBABILITY_COLUMN_ALIASES: readonly string[] = [
  'churn_probability',
  'churnProbability',
  'probability',
];

export const RISK_LEVEL_COLUMN_ALIASES: readonly string[] = ['risk_level', 'riskLevel'];

/** Feature columns the simulator and the model both expect */
export const RECOMMENDED_FEATURE_COLUMNS: readonly string[] = ['tenure', 'MonthlyCharges', 'Contract'];

/**
 * Lower-case and drop separators so `Monthly_Charges`, `monthly charges`
 * and `MonthlyCharges` compare equal.
 */
export function normalizeColumnName(name: string): string {
  return name.toLowerCase().replace(/[\s_-]+/g, '');
}

/**
 * Index of the first column matching one of the aliases (alias priority
 * first, then column order). -1 when none matches.
 */
export function findColumnIndex(columns: readonly string[], aliases: readonly string[]): number {
  const normalized = columns.map(normalizeColumnName);
  for (const alias of aliases) {
    const index = normalized.indexOf(normalizeColumnName(alias));
    if (index !== -1) {
      return index;
    }
  }
  return -1;
}
