export class ConfigError extends Error {
    constructor(public readonly key: string, message: string) {
        super(`${key}: ${message}`);
        this.name = 'ConfigError';
    }
}
