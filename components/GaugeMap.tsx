import React, { useEffect, useRef } from 'react';
import maplibregl, { type StyleSpecification } from 'maplibre-gl';
import 'maplibre-gl/dist/maplibre-gl.css';
import type { MapPoint, MapView } from '../types';
import { GAUGE_LAYER_ID, GAUGE_SOURCE_ID, OSM_ATTRIBUTION, OSM_TILES } from '../constants';
import { toFeatureCollection } from '../server/src/services/mapViewService';
import { formatHover, pointForFeature } from '../services/mapInteraction';
import MapLegend from './MapLegend';

interface GaugeMapProps {
    view: MapView;
    onSelect: (point: MapPoint) => void;
}

function styleFor(view: MapView): StyleSpecification {
    return {
        version: 8,
        sources: {
            basemap: {
                type: 'raster',
                tiles: OSM_TILES,
                tileSize: 256,
                attribution: OSM_ATTRIBUTION
            },
            [GAUGE_SOURCE_ID]: {
                type: 'geojson',
                data: toFeatureCollection(view)
            }
        },
        layers: [
            { id: 'basemap', type: 'raster', source: 'basemap' },
            {
                id: GAUGE_LAYER_ID,
                type: 'circle',
                source: GAUGE_SOURCE_ID,
                paint: {
                    // Marker size is a diameter.
                    'circle-radius': view.markerSize / 2,
                    'circle-color': ['get', 'color'],
                    'circle-opacity': 0.9,
                    'circle-stroke-width': 0.5,
                    'circle-stroke-color': '#334155'
                }
            }
        ]
    };
}

const GaugeMap: React.FC<GaugeMapProps> = ({ view, onSelect }) => {
    const containerRef = useRef<HTMLDivElement>(null);
    const onSelectRef = useRef(onSelect);

    useEffect(() => {
        onSelectRef.current = onSelect;
    }, [onSelect]);

    // The map is built once per view and never redrawn by clicks.
    useEffect(() => {
        if (!containerRef.current) return;

        const map = new maplibregl.Map({
            container: containerRef.current,
            style: styleFor(view),
            center: [view.center.lon, view.center.lat],
            zoom: view.zoom
        });
        map.addControl(new maplibregl.NavigationControl({ showCompass: false }), 'top-left');

        const popup = new maplibregl.Popup({ closeButton: false, closeOnClick: false, offset: 8 });

        map.on('click', GAUGE_LAYER_ID, (event) => {
            const point = pointForFeature(view, event.features?.[0]?.properties);
            if (point) onSelectRef.current(point);
        });

        map.on('mousemove', GAUGE_LAYER_ID, (event) => {
            const point = pointForFeature(view, event.features?.[0]?.properties);
            if (!point) return;
            map.getCanvas().style.cursor = 'pointer';
            popup.setLngLat([point.lon, point.lat]).setText(formatHover(point)).addTo(map);
        });

        map.on('mouseleave', GAUGE_LAYER_ID, () => {
            map.getCanvas().style.cursor = '';
            popup.remove();
        });

        return () => {
            popup.remove();
            map.remove();
        };
    }, [view]);

    return (
        <div className="relative w-full h-full rounded-2xl overflow-hidden border border-white/10 shadow-2xl">
            <div ref={containerRef} className="absolute inset-0" style={{ top: view.margin.t }} />
            <MapLegend legend={view.legend} />
        </div>
    );
};

export default GaugeMap;
