import { importJWK, type KeyLike } from 'jose';
import type { BaseLogger } from 'pino';
import { z } from 'zod';
import { recordKeySetFetch } from '../metrics/prometheus.js';
import { KeySetUnavailableError } from './errors.js';

export const SUPPORTED_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

export type SigningAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export function isSigningAlgorithm(value: unknown): value is SigningAlgorithm {
  return SUPPORTED_ALGORITHMS.some((algorithm) => algorithm === value);
}

export interface KeySetEntry {
  readonly keyId: string;
  readonly publicKey: KeyLike | Uint8Array;
  readonly algorithm: SigningAlgorithm;
}

export interface IssuerKeySource {
  issuer: string;
  jwksUri: string;
}

/** Retrieves the raw key-set document; must reject on network or HTTP failure. */
export type KeySetFetcher = (url: URL, signal: AbortSignal) => Promise<unknown>;

export interface KeySetCacheOptions {
  issuers: IssuerKeySource[];
  logger: BaseLogger;
  fetcher?: KeySetFetcher;
  /** Age after which a cached set is refreshed on the next lookup. 0 disables. */
  ttlMs?: number;
  /** Minimum spacing between refreshes triggered by an unknown kid. */
  refreshCooldownMs?: number;
  fetchTimeoutMs?: number;
  now?: () => number;
}

export interface KeySetCacheStats {
  hits: number;
  misses: number;
  fetches: number;
  failures: number;
}

const JwkSchema = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  alg: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

const KeySetDocumentSchema = z.object({
  keys: z.array(JwkSchema),
});

type Jwk = z.infer<typeof JwkSchema>;

type KeyMap = ReadonlyMap<string, KeySetEntry>;

type IssuerState = {
  keys: KeyMap | null;
  fetchedAt: number;
  lastRefreshAttempt: number;
  inflight: Promise<KeyMap> | null;
};

const CURVE_ALGORITHMS: Record<string, SigningAlgorithm> = {
  'P-256': 'ES256',
  'P-384': 'ES384',
  'P-521': 'ES512',
};

function resolveAlgorithm(jwk: Jwk): SigningAlgorithm | undefined {
  if (jwk.alg !== undefined) {
    return isSigningAlgorithm(jwk.alg) ? jwk.alg : undefined;
  }
  if (jwk.kty === 'RSA') return 'RS256';
  if (jwk.kty === 'EC' && jwk.crv) return CURVE_ALGORITHMS[jwk.crv];
  return undefined;
}

export const fetchKeySetOverHttp: KeySetFetcher = async (url, signal) => {
  const res = await fetch(url, { signal, headers: { Accept: 'application/json' } });
  if (!res.ok) {
    throw new Error(`Key set fetch failed: HTTP ${res.status}`);
  }
  return res.json();
};

/**
 * Process-wide cache of issuer signing keys.
 *
 * Lookups are served from an immutable map per issuer. A miss (no map yet, unknown kid,
 * or an expired map) triggers one refresh shared by every concurrent caller; the new map
 * replaces the old one in a single assignment so readers never see a partial set.
 */
export class KeySetCache {
  private readonly sources = new Map<string, URL>();
  private readonly state = new Map<string, IssuerState>();
  private readonly fetcher: KeySetFetcher;
  private readonly ttlMs: number;
  private readonly refreshCooldownMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: BaseLogger;
  private readonly counters: KeySetCacheStats = { hits: 0, misses: 0, fetches: 0, failures: 0 };

  constructor(options: KeySetCacheOptions) {
    for (const source of options.issuers) {
      this.sources.set(source.issuer, new URL(source.jwksUri));
    }
    this.fetcher = options.fetcher ?? fetchKeySetOverHttp;
    this.ttlMs = options.ttlMs ?? 0;
    this.refreshCooldownMs = options.refreshCooldownMs ?? 0;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 5_000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  /** Returns the entry for `keyId`, or undefined when the issuer does not publish it. */
  async getKey(issuer: string, keyId: string): Promise<KeySetEntry | undefined> {
    if (!this.sources.has(issuer)) {
      this.logger.debug({ issuer }, 'Key lookup for unregistered issuer');
      return undefined;
    }

    const state = this.stateFor(issuer);
    const cached = state.keys;
    const stale = cached !== null && this.isStale(state);

    if (cached && !stale) {
      const hit = cached.get(keyId);
      if (hit) {
        this.counters.hits += 1;
        return hit;
      }
    }

    this.counters.misses += 1;

    // A refresh already under way is joined, cooldown or not.
    if (cached && !stale && !state.inflight && this.inCooldown(state)) {
      this.logger.debug({ issuer, kid: keyId }, 'Unknown kid during refresh cooldown');
      return undefined;
    }

    try {
      const refreshed = await this.load(issuer);
      return refreshed.get(keyId);
    } catch (error) {
      // An expired map still holds keys the issuer published; keep serving them while the issuer is unreachable.
      const fallback = stale ? cached?.get(keyId) : undefined;
      if (fallback) {
        this.logger.warn({ issuer, kid: keyId }, 'Serving expired key set after failed refresh');
        return fallback;
      }
      throw error;
    }
  }

  /** Forces a refresh (coalesced with any in-flight one) and returns the number of usable keys. */
  async refresh(issuer: string): Promise<number> {
    if (!this.sources.has(issuer)) {
      throw new Error(`Issuer is not registered with the key set cache: ${issuer}`);
    }
    const keys = await this.load(issuer);
    return keys.size;
  }

  peek(issuer: string): { keyIds: string[]; fetchedAt: Date | null } | undefined {
    if (!this.sources.has(issuer)) return undefined;
    const state = this.state.get(issuer);
    if (!state?.keys) return { keyIds: [], fetchedAt: null };
    return { keyIds: [...state.keys.keys()], fetchedAt: new Date(state.fetchedAt) };
  }

  stats(): KeySetCacheStats {
    return { ...this.counters };
  }

  private stateFor(issuer: string): IssuerState {
    let state = this.state.get(issuer);
    if (!state) {
      state = { keys: null, fetchedAt: 0, lastRefreshAttempt: 0, inflight: null };
      this.state.set(issuer, state);
    }
    return state;
  }

  private isStale(state: IssuerState): boolean {
    return this.ttlMs > 0 && this.now() - state.fetchedAt >= this.ttlMs;
  }

  private inCooldown(state: IssuerState): boolean {
    return this.refreshCooldownMs > 0 && this.now() - state.lastRefreshAttempt < this.refreshCooldownMs;
  }

  private load(issuer: string): Promise<KeyMap> {
    const state = this.stateFor(issuer);
    if (state.inflight) {
      return state.inflight;
    }
    const inflight = this.fetchKeys(issuer, state).finally(() => {
      state.inflight = null;
    });
    state.inflight = inflight;
    return inflight;
  }

  private async fetchKeys(issuer: string, state: IssuerState): Promise<KeyMap> {
    const url = this.sources.get(issuer);
    if (!url) {
      throw new KeySetUnavailableError(issuer, 'Issuer has no key set endpoint');
    }

    state.lastRefreshAttempt = this.now();
    this.counters.fetches += 1;

    let document: unknown;
    try {
      document = await this.fetcher(url, AbortSignal.timeout(this.fetchTimeoutMs));
    } catch (error) {
      this.counters.failures += 1;
      recordKeySetFetch({ result: 'error' });
      this.logger.warn({ err: error, issuer, url: url.toString() }, 'Key set fetch failed');
      throw new KeySetUnavailableError(issuer, 'Signing keys could not be retrieved from the issuer', {
        cause: error,
      });
    }

    const parsed = KeySetDocumentSchema.safeParse(document);
    if (!parsed.success) {
      this.counters.failures += 1;
      recordKeySetFetch({ result: 'invalid' });
      this.logger.warn({ issuer, issues: parsed.error.issues.length }, 'Key set document has an unexpected shape');
      throw new KeySetUnavailableError(issuer, 'Issuer returned an invalid key set document');
    }

    const entries = new Map<string, KeySetEntry>();
    for (const jwk of parsed.data.keys) {
      const entry = await this.toEntry(issuer, jwk);
      if (!entry) continue;
      if (entries.has(entry.keyId)) {
        this.logger.warn({ issuer, kid: entry.keyId }, 'Duplicate kid in key set; keeping the first');
        continue;
      }
      entries.set(entry.keyId, entry);
    }

    state.keys = entries;
    state.fetchedAt = this.now();
    recordKeySetFetch({ result: 'ok' });
    this.logger.info({ issuer, keyCount: entries.size }, 'Key set refreshed');
    return entries;
  }

  private async toEntry(issuer: string, jwk: Jwk): Promise<KeySetEntry | null> {
    if (!jwk.kid) {
      this.logger.debug({ issuer, kty: jwk.kty }, 'Skipping key without kid');
      return null;
    }
    if (jwk.use !== undefined && jwk.use !== 'sig') {
      return null;
    }
    const algorithm = resolveAlgorithm(jwk);
    if (!algorithm) {
      this.logger.debug({ issuer, kid: jwk.kid, alg: jwk.alg }, 'Skipping key with unsupported algorithm');
      return null;
    }

    try {
      const publicKey = await importJWK({ kty: jwk.kty, n: jwk.n, e: jwk.e, crv: jwk.crv, x: jwk.x, y: jwk.y }, algorithm);
      return Object.freeze({ keyId: jwk.kid, publicKey, algorithm });
    } catch (error) {
      this.logger.warn({ err: error, issuer, kid: jwk.kid }, 'Skipping key that could not be imported');
      return null;
    }
  }
}
