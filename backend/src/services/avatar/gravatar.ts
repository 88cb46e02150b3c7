import crypto from 'crypto';

export interface AvatarLookup {
    /** Image URL for the address, or null when none can be derived */
    lookup(email: string): Promise<string | null>;
}

const GRAVATAR_BASE_URL = 'https://www.gravatar.com/avatar';

export class GravatarLookup implements AvatarLookup {
    constructor(private readonly size = 250) {}

    async lookup(email: string): Promise<string | null> {
        const normalized = email.trim().toLowerCase();
        if (!normalized) return null;
        const digest = crypto.createHash('md5').update(normalized).digest('hex');
        return `${GRAVATAR_BASE_URL}/${digest}?s=${this.size}&d=identicon`;
    }
}
