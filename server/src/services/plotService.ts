import { z } from 'zod';
import { DAILY, PLACEHOLDER_TEXT } from '../constants';
import { describeError } from '../errors';
import type { DailySeries, PanelFragment, PlotError, ResultsStore, StreamflowRow } from '../types';
import { toDataUri, type ChartRenderer } from './chartRenderer';

type LogFn = (message: string) => void;

type Result<T> = { ok: true; value: T } | { ok: false; error: PlotError };

const dailySeriesSchema = z.object({
    date: z.array(z.string()),
    flow_mm_d_obs: z.array(z.number().nullable()),
    flow_mm_d_sim: z.array(z.number().nullable())
});

const gaugeResultSchema = z.object({ [DAILY]: dailySeriesSchema });

const clickEventSchema = z.object({ points: z.array(z.unknown()) });

// First metadata field is the gauge id; the rest is hover data.
const clickedPointSchema = z.object({
    customdata: z.tuple([z.union([z.string(), z.number()])]).rest(z.unknown())
});

export type ClickSelection =
    | { kind: 'none' }
    | { kind: 'gauge'; gaugeId: string }
    | { kind: 'invalid'; detail: string };

export const placeholderFragment = (): PanelFragment => ({ kind: 'placeholder', text: PLACEHOLDER_TEXT });

/**
 * Reads the clicked point. An event with no point means nothing is selected
 * yet; a point whose id cannot be read is an invalid click.
 */
export function readClick(clickData: unknown): ClickSelection {
    const event = clickEventSchema.safeParse(clickData);
    if (!event.success || event.data.points.length === 0) return { kind: 'none' };

    const point = clickedPointSchema.safeParse(event.data.points[0]);
    if (!point.success) {
        const issue = point.error.issues[0];
        const detail = issue ? `${issue.path.join('.') || 'point'}: ${issue.message}` : 'unreadable point';
        return { kind: 'invalid', detail };
    }
    return { kind: 'gauge', gaugeId: String(point.data.customdata[0]) };
}

export function lookupDailySeries(results: ResultsStore, gaugeId: string): Result<DailySeries> {
    if (!results.has(gaugeId)) return { ok: false, error: { kind: 'NotFound', gaugeId } };

    const parsed = gaugeResultSchema.safeParse(results.get(gaugeId));
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const detail = issue ? `${issue.path.join('.') || 'entry'}: ${issue.message}` : 'unreadable entry';
        return { ok: false, error: { kind: 'MalformedSeries', gaugeId, detail } };
    }

    const series = parsed.data[DAILY];
    const { date, flow_mm_d_obs, flow_mm_d_sim } = series;
    if (flow_mm_d_obs.length !== date.length || flow_mm_d_sim.length !== date.length) {
        return {
            ok: false,
            error: {
                kind: 'MalformedSeries',
                gaugeId,
                detail: `series lengths differ (date=${date.length}, observed=${flow_mm_d_obs.length}, simulated=${flow_mm_d_sim.length})`
            }
        };
    }
    if (date.length === 0) {
        return { ok: false, error: { kind: 'MalformedSeries', gaugeId, detail: 'series has no time steps' } };
    }
    return { ok: true, value: series };
}

/**
 * Rows for the chart. Only the final time step is kept; the chart is a
 * single observed/simulated pair, not the full history.
 */
export function latestStep(series: DailySeries): StreamflowRow[] {
    const last = series.date.length - 1;
    return [{ date: series.date[last], observed: series.flow_mm_d_obs[last], simulated: series.flow_mm_d_sim[last] }];
}

export function describePlotError(error: PlotError): string {
    switch (error.kind) {
        case 'InvalidClick':
            return `Could not read a gauge id from the clicked point (${error.detail}).`;
        case 'NotFound':
            return `No streamflow results for gauge ${error.gaugeId}.`;
        case 'MalformedSeries':
            return `Streamflow series for gauge ${error.gaugeId} is malformed: ${error.detail}`;
        case 'RenderFailure':
            return `Could not render streamflow for gauge ${error.gaugeId}: ${error.detail}`;
    }
}

const errorFragment = (error: PlotError): PanelFragment => ({
    kind: 'error',
    gaugeId: error.gaugeId,
    error: error.kind,
    text: describePlotError(error)
});

export interface PlotHandlerDeps {
    results: ResultsStore;
    render: ChartRenderer;
    log?: LogFn;
}

// Payloads arrive straight from the request body.
export type PlotHandler = (clickData: unknown) => PanelFragment;

/**
 * Click-to-plot handler. Stateless: each call depends only on the event and
 * the read-only results it was created with. Never throws.
 */
export function createPlotHandler({ results, render, log = (message: string) => console.log(`[PLOT] ${message}`) }: PlotHandlerDeps): PlotHandler {
    return (clickData) => {
        const selection = readClick(clickData);
        if (selection.kind === 'none') return placeholderFragment();
        if (selection.kind === 'invalid') {
            const error: PlotError = { kind: 'InvalidClick', gaugeId: null, detail: selection.detail };
            log(describePlotError(error));
            return errorFragment(error);
        }
        const { gaugeId } = selection;

        const lookup = lookupDailySeries(results, gaugeId);
        if (!lookup.ok) {
            log(describePlotError(lookup.error));
            return errorFragment(lookup.error);
        }

        let png: Uint8Array;
        try {
            png = render(gaugeId, latestStep(lookup.value));
        } catch (e) {
            const error: PlotError = { kind: 'RenderFailure', gaugeId, detail: describeError(e) };
            log(describePlotError(error));
            return errorFragment(error);
        }

        return {
            kind: 'image',
            gaugeId,
            src: toDataUri(png),
            alt: `Streamflow at Gauge ${gaugeId}`
        };
    };
}
