export const REGIONS = ['india', 'us', 'japan', 'korea', 'china'] as const;

export type Region = (typeof REGIONS)[number];

export type FiscalYearType = 'indian' | 'calendar' | 'japanese';

export const REGION_INFO: Record<
  Region,
  { name: string; fiscalYear: string; fiscalYearType: FiscalYearType }
> = {
  india: { name: 'India', fiscalYear: 'Apr-Mar', fiscalYearType: 'indian' },
  us: { name: 'United States', fiscalYear: 'Jan-Dec', fiscalYearType: 'calendar' },
  japan: { name: 'Japan', fiscalYear: 'Apr-Mar', fiscalYearType: 'japanese' },
  korea: { name: 'South Korea', fiscalYear: 'Jan-Dec', fiscalYearType: 'calendar' },
  china: { name: 'China', fiscalYear: 'Jan-Dec', fiscalYearType: 'calendar' },
};
