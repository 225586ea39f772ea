import path from 'path';
import { fileURLToPath } from 'url';
import type { Express } from 'express';
import { loadConfig, type AppConfig } from './config';
import { createApp, listen } from './app';
import { loadDatasets } from './services/remoteFetcher';
import { prepareStations } from './services/stationService';
import { buildMapView } from './services/mapViewService';
import { createPlotHandler } from './services/plotService';
import { renderStreamflowChart } from './services/chartRenderer';

const log = (msg: string) => console.log(`[BOOT] ${msg}`);

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');

// Development: Vite serves the client with HMR from the same port.
async function attachViteMiddleware(app: Express) {
    const { createServer: createViteServer } = await import('vite');
    const vite = await createViteServer({
        root: projectRoot,
        server: { middlewareMode: true },
        appType: 'spa'
    });
    app.use(vite.middlewares);
}

async function main(config: AppConfig) {
    const { stations: rows, results } = await loadDatasets(config);

    const stations = prepareStations(rows);
    const mapView = buildMapView(stations);
    const handlePlot = createPlotHandler({ results, render: renderStreamflowChart });
    log(`Prepared ${stations.length} stations (${mapView.legend.items.map(i => `${i.category}: ${i.count}`).join(', ')}).`);

    const app = createApp({
        mapView,
        handlePlot,
        stationCount: stations.length,
        gaugeCount: results.size,
        loadedAt: Date.now(),
        clientDir: config.production ? path.join(projectRoot, 'dist') : undefined
    });

    if (!config.production) await attachViteMiddleware(app);

    await listen(app, config.port, config.host);
    log(`Streamflow Explorer running on http://${config.host}:${config.port}`);
}

Promise.resolve()
    .then(() => main(loadConfig()))
    .catch(err => {
        console.error('[BOOT] Failed to start server:', err);
        process.exit(1);
    });
