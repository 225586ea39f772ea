
export type NseCategory = 'Not Satisfactory' | 'Satisfactory' | 'Good' | 'Very Good';

export type Resolution = '1D';

/**
 * One monitored gauge after preparation.
 * `lat`/`long` position the marker; `latitude`/`longitude` are the redundant
 * pair the map center is computed from.
 */
export interface StationRecord {
  gauge_id: string;
  lat: number;
  long: number;
  latitude: number;
  longitude: number;
  nse: number;
  category: NseCategory;
}

/**
 * Results keyed by gauge id. Entries stay unvalidated until a gauge is
 * looked up, so a single bad entry never blocks startup.
 */
export type ResultsStore = ReadonlyMap<string, unknown>;

export interface DailySeries {
  date: string[];
  flow_mm_d_obs: (number | null)[];
  flow_mm_d_sim: (number | null)[];
}

export interface StreamflowRow {
  date: string;
  observed: number | null;
  simulated: number | null;
}

/**
 * Shape of the map's click payload: the first point carries the clicked
 * gauge's hover metadata, gauge id first.
 */
export interface ClickEvent {
  points: { customdata: (string | number | null)[] }[];
}

export type PanelFragment =
  | { kind: 'placeholder'; text: string }
  | { kind: 'image'; gaugeId: string; src: string; alt: string }
  | { kind: 'error'; gaugeId: string | null; error: PlotErrorKind; text: string };

export type PlotErrorKind = 'InvalidClick' | 'NotFound' | 'MalformedSeries' | 'RenderFailure';

export type PlotError =
  | { kind: 'InvalidClick'; gaugeId: null; detail: string }
  | { kind: 'NotFound'; gaugeId: string }
  | { kind: 'MalformedSeries'; gaugeId: string; detail: string }
  | { kind: 'RenderFailure'; gaugeId: string; detail: string };

export interface MapPoint {
  lat: number;
  lon: number;
  color: string;
  category: NseCategory;
  // Score is null when the gauge has none.
  customdata: [string, number | null];
}

export interface LegendItem {
  category: NseCategory;
  label: string;
  color: string;
  count: number;
}

export interface MapView {
  points: MapPoint[];
  center: { lat: number; lon: number };
  zoom: number;
  markerSize: number;
  tileStyle: 'open-street-map';
  margin: { r: number; t: number; l: number; b: number };
  legend: {
    anchor: 'bottom-left';
    x: number;
    y: number;
    items: LegendItem[];
  };
}

export interface ServerStatus {
  status: 'online';
  stations: number;
  gauges: number;
  loaded_at: number;
  server_time: number;
}
