export class SleeperApiError extends Error {
    constructor(
        message: string,
        public url: string,
        public statusCode?: number
    ) {
        super(message);
        this.name = 'SleeperApiError';
    }
}

export class DataFileError extends Error {
    constructor(
        message: string,
        public filePath: string
    ) {
        super(message);
        this.name = 'DataFileError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
