/**
 * Resolves the API key for a request. A key typed by the user wins over the
 * one configured at process start; the configured key never changes.
 */
export class CredentialResolver {
    private readonly configured: string;

    constructor(configuredKey: string = '') {
        this.configured = configuredKey.trim();
    }

    hasConfigured(): boolean {
        return this.configured.length > 0;
    }

    resolve(directInput?: string): string | undefined {
        const direct = directInput?.trim();
        if (direct) {
            return direct;
        }
        return this.configured || undefined;
    }

    /**
     * Safe description for logs.
     */
    describe(directInput?: string): string {
        if (directInput?.trim()) return 'entered by user';
        return this.hasConfigured() ? 'from environment' : 'missing';
    }
}
