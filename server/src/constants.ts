import type { NseCategory, Resolution } from './types';

export const SCORE_FIELD = 'casr_daymet_era5_NSE';

export const DAILY: Resolution = '1D';

// Ordered best-last, matching the legend.
export const NSE_CATEGORIES: NseCategory[] = ['Not Satisfactory', 'Satisfactory', 'Good', 'Very Good'];

export const CATEGORY_COLORS: Record<NseCategory, string> = {
  'Not Satisfactory': 'red',
  'Satisfactory': 'yellow',
  'Good': 'lightgreen',
  'Very Good': 'green'
};

export const CATEGORY_LABELS: Record<NseCategory, string> = {
  'Not Satisfactory': 'Not Satisfactory: NSE < 0.5',
  'Satisfactory': 'Satisfactory: NSE = 0.5-0.7',
  'Good': 'Good: NSE = 0.7-0.8',
  'Very Good': 'Very Good: NSE > 0.8'
};

// Upper bounds are inclusive: a score equal to a bound stays in the lower bucket.
export const NSE_THRESHOLDS = {
  satisfactory: 0.5,
  good: 0.7,
  veryGood: 0.8
} as const;

export const MAP_ZOOM = 3;
export const MARKER_SIZE = 10;

export const PLACEHOLDER_TEXT = 'Click a gauge on the map to view the streamflow.';

// --- Chart ---

export const CHART_WIDTH = 800;
export const CHART_HEIGHT = 800;
export const CHART_FONT = 'DejaVu Sans';

export const SERIES_STYLE = {
  observed: { label: 'Observed', color: 'black', opacity: 1 },
  simulated: { label: 'Simulated', color: 'blue', opacity: 0.7 }
} as const;

export const AXIS_LABELS = {
  x: 'Date',
  y: 'Flow (mm/day)'
} as const;
