/**
 * Default data-quality configuration.
 *
 * Bounds are wide ranges aimed at unit mistakes, such as a market size
 * entered in dollars instead of billions.
 */

import type { QualityConfig } from "./schema.js";

export const DEFAULT_QUALITY_CONFIG: QualityConfig = {
  minYear: 1990,
  futureYearAllowance: 1,
  recencyYears: 5,
  stalenessYears: 5,

  bounds: {
    market_size: { min: 0, max: 1000 },
    market_growth_rate: { min: -100, max: 1000 },
    unit_shipments: { min: 0 },
    average_selling_price: { min: 0 },
    deployment_count: { min: 0 },
    roi_payback_period: { min: 0, max: 240 },
    labor_productivity_gain: { min: -100, max: 1000 },
    adoption_rate: { min: 0, max: 100 },
    funding_raised: { min: 0 },
    employee_count: { min: 0 },
  },

  significance: {
    defaultThresholdPercent: 10,
    thresholds: {
      adoption_rate: 5,
      funding_raised: 25,
    },
  },

  changeDetection: {
    includeOutdatedFallback: true,
  },
};
