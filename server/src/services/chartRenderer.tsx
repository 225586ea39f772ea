import React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { CartesianGrid, Customized, Line, LineChart, XAxis, YAxis } from 'recharts';
import { Resvg } from '@resvg/resvg-js';
import { AXIS_LABELS, CHART_FONT, CHART_HEIGHT, CHART_WIDTH, SERIES_STYLE } from '../constants';
import type { StreamflowRow } from '../types';

const SVG_NS = 'http://www.w3.org/2000/svg';
const MARGIN = { top: 56, right: 24, bottom: 36, left: 16 };
const LEGEND_WIDTH = 130;

const ChartTitle: React.FC<{ text: string }> = ({ text }) => (
    <text x={CHART_WIDTH / 2} y={32} textAnchor="middle" fontSize={18} fontFamily={CHART_FONT} fill="#111">
        {text}
    </text>
);

const ChartLegend: React.FC = () => {
    const x = CHART_WIDTH - MARGIN.right - LEGEND_WIDTH - 10;
    const y = MARGIN.top + 10;
    const entries = [SERIES_STYLE.observed, SERIES_STYLE.simulated];

    return (
        <g className="streamflow-legend">
            <rect x={x} y={y} width={LEGEND_WIDTH} height={22 * entries.length + 12} fill="white" fillOpacity={0.8} stroke="#ccc" rx={4} />
            {entries.map((entry, i) => (
                <g key={entry.label}>
                    <line
                        x1={x + 10} x2={x + 40} y1={y + 18 + i * 22} y2={y + 18 + i * 22}
                        stroke={entry.color} strokeOpacity={entry.opacity} strokeWidth={2}
                    />
                    <text x={x + 48} y={y + 23 + i * 22} fontSize={14} fontFamily={CHART_FONT} fill="#111">
                        {entry.label}
                    </text>
                </g>
            ))}
        </g>
    );
};

/**
 * Chart element tree. Every element that would otherwise get a generated id
 * carries a fixed one, so identical input renders identical markup.
 */
export const StreamflowChart: React.FC<{ gaugeId: string; rows: StreamflowRow[] }> = ({ gaugeId, rows }) => (
    <LineChart id="streamflow" width={CHART_WIDTH} height={CHART_HEIGHT} data={rows} margin={MARGIN}>
        <CartesianGrid strokeDasharray="3 3" stroke="#ddd" />
        <XAxis
            dataKey="date"
            tick={{ fontSize: 12, fontFamily: CHART_FONT }}
            label={{ value: AXIS_LABELS.x, position: 'insideBottom', offset: -8, fontFamily: CHART_FONT }}
        />
        <YAxis
            width={72}
            tick={{ fontSize: 12, fontFamily: CHART_FONT }}
            label={{ value: AXIS_LABELS.y, angle: -90, position: 'insideLeft', fontFamily: CHART_FONT }}
        />
        <Line
            id="streamflow-observed"
            dataKey="observed"
            name={SERIES_STYLE.observed.label}
            stroke={SERIES_STYLE.observed.color}
            strokeWidth={1.5}
            dot={{ r: 3, fill: SERIES_STYLE.observed.color }}
            isAnimationActive={false}
        />
        <Line
            id="streamflow-simulated"
            dataKey="simulated"
            name={SERIES_STYLE.simulated.label}
            stroke={SERIES_STYLE.simulated.color}
            strokeOpacity={SERIES_STYLE.simulated.opacity}
            strokeWidth={1.5}
            dot={{ r: 3, fill: SERIES_STYLE.simulated.color, fillOpacity: SERIES_STYLE.simulated.opacity }}
            isAnimationActive={false}
        />
        <Customized component={<ChartTitle text={`Streamflow at Gauge ${gaugeId}`} />} />
        <Customized component={<ChartLegend />} />
    </LineChart>
);

/**
 * recharts wraps its surface in HTML; keep only what sits inside the <svg>
 * and re-root it in a standalone document the rasterizer accepts.
 */
export function toSvgDocument(markup: string): string {
    const match = /<svg\b[^>]*>([\s\S]*)<\/svg>/.exec(markup);
    if (!match) throw new Error('chart produced no SVG surface');
    return (
        `<svg xmlns="${SVG_NS}" width="${CHART_WIDTH}" height="${CHART_HEIGHT}" viewBox="0 0 ${CHART_WIDTH} ${CHART_HEIGHT}">` +
        `<rect width="${CHART_WIDTH}" height="${CHART_HEIGHT}" fill="white"/>` +
        match[1] +
        '</svg>'
    );
}

export function renderStreamflowSvg(gaugeId: string, rows: StreamflowRow[]): string {
    return toSvgDocument(renderToStaticMarkup(<StreamflowChart gaugeId={gaugeId} rows={rows} />));
}

export function renderStreamflowChart(gaugeId: string, rows: StreamflowRow[]): Buffer {
    const resvg = new Resvg(renderStreamflowSvg(gaugeId, rows), {
        background: 'white',
        fitTo: { mode: 'original' },
        font: { loadSystemFonts: true, defaultFontFamily: CHART_FONT }
    });
    return resvg.render().asPng();
}

export const toDataUri = (png: Uint8Array): string => `data:image/png;base64,${Buffer.from(png).toString('base64')}`;

export type ChartRenderer = (gaugeId: string, rows: StreamflowRow[]) => Uint8Array;
