import fs from 'fs';
import os from 'os';
import path from 'path';
import axios from 'axios';
import type { AxiosInstance, InternalAxiosRequestConfig } from 'axios';

export const FIXTURES_RAW_DIR = path.join(__dirname, 'fixtures', 'raw');

export function makeTempDir(prefix = 'sleeper-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/** Copies the fixture raw snapshot into a fresh directory. */
export function copyFixtureRaw(target: string): string {
    fs.cpSync(FIXTURES_RAW_DIR, target, { recursive: true });
    return target;
}

/** Every file under dir, keyed by its path relative to dir. */
export function readTree(dir: string): Map<string, string> {
    const files = new Map<string, string>();
    const walk = (current: string) => {
        for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
            const full = path.join(current, entry.name);
            if (entry.isDirectory()) walk(full);
            else files.set(path.relative(dir, full), fs.readFileSync(full, 'utf8'));
        }
    };
    walk(dir);
    return new Map([...files.entries()].sort((a, b) => a[0].localeCompare(b[0])));
}

export type FakeRoute = {
    status?: number;
    statusText?: string;
    body: string | Buffer;
};

export type FakeHttp = {
    http: AxiosInstance;
    calls: string[];
};

/**
 * An axios instance answering from a url -> response table instead of the
 * network. Bodies are handed back as raw bytes, the way the Node adapter
 * delivers an arraybuffer response. Unknown urls get a 404.
 */
export function fakeHttp(routes: Record<string, FakeRoute>): FakeHttp {
    const calls: string[] = [];
    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig) => {
            const url = config.url ?? '';
            calls.push(url);
            const route = routes[url];
            const status = route ? route.status ?? 200 : 404;
            const body = route ? route.body : '';
            return {
                data: Buffer.isBuffer(body) ? body : Buffer.from(body, 'utf8'),
                status,
                statusText: route?.statusText ?? (status === 200 ? 'OK' : 'Not Found'),
                headers: {},
                config,
            };
        },
    });
    return { http, calls };
}
