/**
 * Sample customer table
 *
 * Deterministic demo data in the telecom layout the scoring model was
 * trained on. Same seed and row count, same table.
 */

import type { RawTable } from '../core/types.js';
import { mulberry32 } from '../scoring/simulator.js';
import { CANONICAL_ID_COLUMN } from './columns.js';

export const DEFAULT_SAMPLE_ROWS = 10;
export const MAX_SAMPLE_ROWS = 10000;

type Random = () => number;

interface SampleColumn {
  readonly name: string;
  readonly generate: (random: Random) => string;
}

const choice =
  (...options: readonly string[]) =>
  (random: Random): string =>
    options[Math.floor(random() * options.length)] ?? options[0] ?? '';

const integer =
  (min: number, max: number) =>
  (random: Random): string =>
    String(min + Math.floor(random() * (max - min + 1)));

const amount =
  (min: number, max: number) =>
  (random: Random): string =>
    (min + random() * (max - min)).toFixed(2);

const SAMPLE_COLUMNS: readonly SampleColumn[] = [
  { name: 'gender', generate: choice('Male', 'Female') },
  { name: 'SeniorCitizen', generate: choice('0', '1') },
  { name: 'Partner', generate: choice('Yes', 'No') },
  { name: 'Dependents', generate: choice('Yes', 'No') },
  { name: 'tenure', generate: integer(1, 72) },
  { name: 'PhoneService', generate: choice('Yes', 'No') },
  { name: 'MultipleLines', generate: choice('Yes', 'No', 'No phone service') },
  { name: 'InternetService', generate: choice('DSL', 'Fiber optic', 'No') },
  { name: 'OnlineSecurity', generate: choice('Yes', 'No', 'No internet service') },
  { name: 'TechSupport', generate: choice('Yes', 'No', 'No internet service') },
  { name: 'StreamingTV', generate: choice('Yes', 'No', 'No internet service') },
  { name: 'Contract', generate: choice('Month-to-month', 'One year', 'Two year') },
  { name: 'PaperlessBilling', generate: choice('Yes', 'No') },
  {
    name: 'PaymentMethod',
    generate: choice('Electronic check', 'Mailed check', 'Bank transfer (automatic)', 'Credit card (automatic)'),
  },
  { name: 'MonthlyCharges', generate: amount(20, 110) },
  { name: 'TotalCharges', generate: amount(100, 5000) },
];

export function sampleId(index: number): string {
  return `CUST_${String(index + 1).padStart(4, '0')}`;
}

export function generateSampleTable(rows: number = DEFAULT_SAMPLE_ROWS, seed = 42): RawTable {
  if (!Number.isInteger(rows) || rows < 1 || rows > MAX_SAMPLE_ROWS) {
    throw new RangeError(`Sample row count must be an integer between 1 and ${MAX_SAMPLE_ROWS}`);
  }

  const random = mulberry32(seed);
  const body: string[][] = [];
  for (let i = 0; i < rows; i++) {
    body.push([sampleId(i), ...SAMPLE_COLUMNS.map((column) => column.generate(random))]);
  }

  return {
    columns: [CANONICAL_ID_COLUMN, ...SAMPLE_COLUMNS.map((column) => column.name)],
    rows: body,
  };
}
