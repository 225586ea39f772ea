import { z } from 'zod';
import type { AppConfig } from '../config';
import { SCORE_FIELD } from '../constants';
import { RemoteFetchError, describeError } from '../errors';
import type { ResultsStore } from '../types';

type LogFn = (message: string) => void;
type FetchFn = (url: string) => Promise<Response>;

let log: LogFn = (message: string) => console.log(`[FETCH] ${message}`);
export const setLogger = (logger: LogFn) => {
    log = logger;
};

// Gauge ids are sometimes serialized as numbers; keep them as strings.
const gaugeIdSchema = z.union([z.string(), z.number()]).transform(String);

export const stationRowSchema = z.object({
    gauge_id: gaugeIdSchema,
    lat: z.number(),
    long: z.number(),
    latitude: z.number(),
    longitude: z.number(),
    // JSON has no NaN; a gauge without a score arrives as null.
    [SCORE_FIELD]: z.number().nullable().transform(v => v ?? Number.NaN)
});

export type RawStationRow = z.infer<typeof stationRowSchema>;

export const stationTableSchema = z.array(stationRowSchema);

export const resultsSchema = z.record(z.string(), z.unknown());

export interface Datasets {
    stations: RawStationRow[];
    results: ResultsStore;
}

export const resourceUrl = (config: Pick<AppConfig, 'dataUrlTemplate'>, resourceId: string): string =>
    config.dataUrlTemplate.replace('{id}', encodeURIComponent(resourceId));

/**
 * GET a JSON resource and parse it against `schema`.
 * Rejects on non-2xx status, non-JSON body, or schema mismatch. No retries.
 */
export async function fetchResource<T extends z.ZodTypeAny>(
    url: string,
    schema: T,
    fetchImpl: FetchFn = fetch
): Promise<z.output<T>> {
    let res: Response;
    try {
        res = await fetchImpl(url);
    } catch (e) {
        throw new RemoteFetchError(`Request to ${url} failed: ${describeError(e)}`, url, null, { cause: e });
    }
    if (!res.ok) throw new RemoteFetchError(`HTTP ${res.status} from ${url}`, url, res.status);

    let body: unknown;
    try {
        body = await res.json();
    } catch (e) {
        throw new RemoteFetchError(`Response from ${url} is not valid JSON: ${describeError(e)}`, url, res.status, { cause: e });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new RemoteFetchError(`Unexpected data from ${url}${where}: ${issue?.message ?? 'invalid'}`, url, res.status, { cause: parsed.error });
    }
    return parsed.data;
}

export async function loadDatasets(
    config: Pick<AppConfig, 'dataUrlTemplate' | 'stationsResourceId' | 'resultsResourceId'>,
    fetchImpl: FetchFn = fetch
): Promise<Datasets> {
    log('Downloading station table and model results...');
    const [stations, rawResults] = await Promise.all([
        fetchResource(resourceUrl(config, config.stationsResourceId), stationTableSchema, fetchImpl),
        fetchResource(resourceUrl(config, config.resultsResourceId), resultsSchema, fetchImpl)
    ]);

    const results: ResultsStore = new Map(Object.entries(rawResults));
    log(`Loaded ${stations.length} stations and results for ${results.size} gauges.`);
    return { stations, results };
}
