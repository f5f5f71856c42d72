export const REGIONS = ['americas', 'asia', 'europe', 'sea'] as const;

export type Region = (typeof REGIONS)[number];

export const isRegion = (value: string): value is Region =>
  REGIONS.some((region) => region === value);
