
// Wire types shared with the API server.
export type { ClickEvent, MapPoint, MapView, PanelFragment } from './server/src/types';

export type LoadStatus = 'Initializing...' | 'Ready' | 'Loading plot...' | 'Error';
