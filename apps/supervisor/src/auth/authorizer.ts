/**
 * Identity check performed once per recipient before its first dispatch.
 * A rejected promise counts as a denial.
 */
export interface Authorizer {
    authorize(recipient: string): Promise<boolean>;
}

export const allowAll: Authorizer = {
    authorize: async () => true,
};

/** Allows only the listed agent names (case-insensitive). */
export class StaticAuthorizer implements Authorizer {
    private readonly allowed: Set<string>;

    constructor(names: Iterable<string>) {
        this.allowed = new Set(Array.from(names, n => n.trim().toLowerCase()));
    }

    async authorize(recipient: string): Promise<boolean> {
        return this.allowed.has(recipient.trim().toLowerCase());
    }
}
