/**
 * @file Flag Binder
 *
 * Token → parameter lookup used by the command-line parser. Three token
 * classes bind to a section/key pair:
 *
 * - long flags: `--basic-types-bool-param`
 * - short flags: `-b`
 * - positional indices: `0`, `1`, ... (the ordinal of a non-flag token)
 *
 * A token binds at most one pair; a pair holds at most one token of each
 * class. Binding a token that is already taken moves it, and binding a
 * second token of the same class to a pair releases the first.
 *
 * @module cli
 */

import type { ParamAddress } from '../params/types.js';

export type FlagTokenClass = 'long' | 'short' | 'index';

interface AddressTokens {
    long?: string;
    short?: string;
    index?: string;
}

/**
 * Classify a binder token.
 *
 * @returns The token class, or null for text that is not bindable
 *          (empty, a lone `-`, or a non-numeric positional).
 */
export function flagToken_classify(token: string): FlagTokenClass | null {
    if (token.startsWith('--') && token.length > 2) return 'long';
    if (token.startsWith('-') && !token.startsWith('--') && token.length > 1) return 'short';
    if (/^\d+$/.test(token)) return 'index';
    return null;
}

function address_id(address: ParamAddress): string {
    return JSON.stringify([address.section, address.key]);
}

export class FlagBinder {
    private readonly bindings: Map<string, ParamAddress> = new Map();
    private readonly byAddress: Map<string, AddressTokens> = new Map();

    /**
     * Bind a token to a section/key pair.
     *
     * @throws If the token is not a long flag, short flag or index.
     */
    public flag_bind(token: string, address: ParamAddress): void {
        const tokenClass: FlagTokenClass | null = flagToken_classify(token);
        if (!tokenClass) {
            throw new Error(`Cannot bind command line token '${token}'`);
        }

        this.flag_unbind(token);

        const id: string = address_id(address);
        const tokens: AddressTokens = this.byAddress.get(id) ?? {};
        const displaced: string | undefined = tokens[tokenClass];
        if (displaced !== undefined) {
            this.bindings.delete(displaced);
        }
        tokens[tokenClass] = token;
        this.byAddress.set(id, tokens);
        this.bindings.set(token, { section: address.section, key: address.key });
    }

    /**
     * Release a token. No-op when it is unbound.
     */
    public flag_unbind(token: string): void {
        const address: ParamAddress | undefined = this.bindings.get(token);
        if (!address) return;

        this.bindings.delete(token);
        const id: string = address_id(address);
        const tokens: AddressTokens | undefined = this.byAddress.get(id);
        if (!tokens) return;

        for (const tokenClass of ['long', 'short', 'index'] as const) {
            if (tokens[tokenClass] === token) {
                delete tokens[tokenClass];
            }
        }
        if (tokens.long === undefined && tokens.short === undefined && tokens.index === undefined) {
            this.byAddress.delete(id);
        }
    }

    /**
     * Resolve a token verbatim.
     */
    public flag_resolve(token: string): ParamAddress | null {
        return this.bindings.get(token) ?? null;
    }

    /**
     * Token of one class bound to a pair, or null.
     */
    public token_get(address: ParamAddress, tokenClass: FlagTokenClass): string | null {
        return this.byAddress.get(address_id(address))?.[tokenClass] ?? null;
    }

    public clear(): void {
        this.bindings.clear();
        this.byAddress.clear();
    }
}
