
export const APP_TITLE = 'Streamflow Explorer';
export const PAGE_HEADING = 'Click a Gauge to View Streamflow';

// OpenStreetMap raster basemap
export const OSM_TILES = [
  'https://a.tile.openstreetmap.org/{z}/{x}/{y}.png',
  'https://b.tile.openstreetmap.org/{z}/{x}/{y}.png',
  'https://c.tile.openstreetmap.org/{z}/{x}/{y}.png'
];

export const OSM_ATTRIBUTION =
  '&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors';

export const GAUGE_SOURCE_ID = 'gauges';
export const GAUGE_LAYER_ID = 'gauges';
