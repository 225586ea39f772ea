import { ConfigError } from './errors';

export interface AppConfig {
    port: number;
    host: string;
    dataUrlTemplate: string;
    stationsResourceId: string;
    resultsResourceId: string;
    production: boolean;
}

const DEFAULT_PORT = 10000;
const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_DATA_URL_TEMPLATE = 'https://drive.google.com/uc?export=download&id={id}';

type Env = Record<string, string | undefined>;

const required = (env: Env, key: string): string => {
    const value = env[key]?.trim();
    if (!value) throw new ConfigError(`Missing required environment variable ${key}`);
    return value;
};

const parsePort = (raw: string | undefined): number => {
    if (raw === undefined || raw.trim() === '') return DEFAULT_PORT;
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigError(`Invalid PORT "${raw}"`);
    }
    return port;
};

export function loadConfig(env: Env = process.env): AppConfig {
    const dataUrlTemplate = env.DATA_URL_TEMPLATE?.trim() || DEFAULT_DATA_URL_TEMPLATE;
    if (!dataUrlTemplate.includes('{id}')) {
        throw new ConfigError('DATA_URL_TEMPLATE must contain an {id} placeholder');
    }

    return {
        port: parsePort(env.PORT),
        host: env.HOST?.trim() || DEFAULT_HOST,
        dataUrlTemplate,
        stationsResourceId: required(env, 'STATIONS_RESOURCE_ID'),
        resultsResourceId: required(env, 'RESULTS_RESOURCE_ID'),
        production: env.NODE_ENV === 'production'
    };
}
