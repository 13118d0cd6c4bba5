// src/smartrent/token-store.ts
import { AuthenticationError } from './errors.js';
import { hasErrorCode } from './http-client.js';
import type { SessionResult, SmartRentHttpClient, TokenGrant } from './http-client.js';
import { createConsoleLogger } from './logger.js';
import type { SmartRentLogger } from './logger.js';
import type { Credential, TokenState, TwoFactorCodeProvider } from './types.js';

/** Refresh this long before the reported expiry. */
export const TOKEN_REFRESH_MARGIN_MS = 60_000;

/**
 * Anything that can hand out a usable access token. The fetcher and the
 * connection manager depend on this rather than on TokenStore itself.
 */
export interface TokenSource {
	/** Current token, refreshing first when it is missing or about to expire. */
	ensureFresh(): Promise<string>;
	/** Unconditional refresh, after the server rejected the current token. */
	refresh(): Promise<string>;
}

export interface TokenStoreOptions {
	log?: SmartRentLogger;
	twoFactorCodeProvider?: TwoFactorCodeProvider;
	now?: () => number;
}

const TWO_FACTOR_CODE = /^\d{6}$/;

/**
 * In-memory holder of the SmartRent access/refresh tokens.
 *
 * Only one refresh is ever in flight: concurrent callers await the same
 * promise instead of issuing their own requests.
 */
export class TokenStore implements TokenSource {
	private readonly log: SmartRentLogger;
	private readonly now: () => number;
	private state: TokenState | null = null;
	private inFlight: Promise<TokenState> | null = null;

	public constructor(
		private readonly http: SmartRentHttpClient,
		private readonly credential: Credential,
		private readonly options: TokenStoreOptions = {},
	) {
		this.log = options.log ?? createConsoleLogger('smartrent-tokens');
		this.now = options.now ?? Date.now;
	}

	public getState(): TokenState | null {
		return this.state ? { ...this.state } : null;
	}

	public isFresh(): boolean {
		return this.state !== null && this.state.expiresAt - TOKEN_REFRESH_MARGIN_MS > this.now();
	}

	public async ensureFresh(): Promise<string> {
		if (this.inFlight) {
			return (await this.inFlight).accessToken;
		}

		if (this.state && this.isFresh()) {
			return this.state.accessToken;
		}

		return this.refresh();
	}

	public async refresh(): Promise<string> {
		if (!this.inFlight) {
			this.inFlight = this.doRefresh().finally(() => {
				this.inFlight = null;
			});
		}
		return (await this.inFlight).accessToken;
	}

	private async doRefresh(): Promise<TokenState> {
		let result: SessionResult;

		if (this.state?.refreshToken) {
			result = await this.http.refreshSession(this.state.refreshToken);

			if (result.kind === 'rejected' && (result.status === 401 || hasErrorCode(result.errors, 'unauthorized'))) {
				this.log.warn(
					'SmartRent: refresh token rejected (%o); trying email and password instead.',
					result.errors.map((entry) => entry.code),
				);
				result = await this.loginWithPassword();
			}
		} else {
			result = await this.loginWithPassword();
		}

		if (result.kind === 'two-factor') {
			throw new AuthenticationError('SmartRent asked for a second two-factor step; login cannot complete.');
		}

		if (result.kind === 'rejected') {
			const codes = result.errors.map((entry) => entry.description ?? entry.code).join(', ');
			throw new AuthenticationError(
				`SmartRent token not retrieved; login probably not successful: ${codes}`,
				{ status: result.status },
			);
		}

		const next = this.toTokenState(result.grant);
		this.state = next;

		this.log.info(
			'SmartRent: tokens refreshed; expiresAt=%s',
			new Date(next.expiresAt).toISOString(),
		);

		return next;
	}

	private async loginWithPassword(): Promise<SessionResult> {
		const { email, password } = this.credential;
		if (!email || !password) {
			throw new AuthenticationError('SmartRent email and password are required to log in.');
		}

		this.log.info('SmartRent: logging in with email for %s', email);
		const result = await this.http.createSession(email, password);

		if (result.kind !== 'two-factor') {
			return result;
		}

		const code = await this.obtainTwoFactorCode();
		this.log.info('SmartRent: completing two-factor login for %s', email);
		return this.http.createTwoFactorSession(result.tfaApiToken, code);
	}

	private async obtainTwoFactorCode(): Promise<string> {
		let raw = this.credential.twoFactorCode;

		if (raw === undefined || raw.trim() === '') {
			if (!this.options.twoFactorCodeProvider) {
				throw new AuthenticationError(
					'SmartRent account requires a two-factor code; none was configured.',
				);
			}
			raw = await this.options.twoFactorCodeProvider();
		}

		const code = raw.trim();
		if (!TWO_FACTOR_CODE.test(code)) {
			throw new AuthenticationError('SmartRent two-factor code must be six digits.');
		}
		return code;
	}

	private toTokenState(grant: TokenGrant): TokenState {
		return {
			accessToken: grant.accessToken,
			refreshToken: grant.refreshToken,
			expiresAt: grant.expires * 1000,
		};
	}
}
