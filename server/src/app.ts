import express, { type Express } from 'express';
import cors from 'cors';
import path from 'path';
import type { Server } from 'http';
import type { PlotHandler } from './services/plotService';
import type { MapView, ServerStatus } from './types';

export interface AppDeps {
    mapView: Readonly<MapView>;
    handlePlot: PlotHandler;
    stationCount: number;
    gaugeCount: number;
    loadedAt: number;
    // Built client to serve (production). Omitted in dev and tests.
    clientDir?: string;
}

const log = (msg: string) => console.log(`[SERVER] ${msg}`);

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.use(cors());
    app.use(express.json({ limit: '100kb' }));

    // --- API Routes ---

    app.get('/api/map-view', (req, res) => {
        res.json(deps.mapView);
    });

    app.post('/api/interactions/map-click', (req, res) => {
        const body: unknown = req.body ?? {};
        if (typeof body !== 'object' || body === null || Array.isArray(body)) {
            res.status(400).json({ error: 'Request body must be an object with a clickData field' });
            return;
        }
        try {
            const clickData = 'clickData' in body ? body.clickData : null;
            res.json(deps.handlePlot(clickData));
        } catch (e) {
            log(`map-click failed: ${e}`);
            res.status(500).json({ error: String(e) });
        }
    });

    app.get('/api/status', (req, res) => {
        const status: ServerStatus = {
            status: 'online',
            stations: deps.stationCount,
            gauges: deps.gaugeCount,
            loaded_at: deps.loadedAt,
            server_time: Date.now()
        };
        res.json(status);
    });

    app.all('/api/*', (req, res) => {
        res.status(404).json({ error: 'Not found' });
    });

    // Serve Static Files (Client Build)
    if (deps.clientDir) {
        const clientDir = deps.clientDir;
        app.use(express.static(clientDir));
        // Catch-all for SPA (must be last)
        app.get('*', (req, res) => {
            res.sendFile(path.join(clientDir, 'index.html'));
        });
    }

    return app;
}

/** Resolves once the server is accepting connections; rejects on a bind failure. */
export function listen(app: Express, port: number, host: string): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        const onError = (err: Error) => reject(err);
        server.once('error', onError);
        server.once('listening', () => {
            server.off('error', onError);
            resolve(server);
        });
    });
}
