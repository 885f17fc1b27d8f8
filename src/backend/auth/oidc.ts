import { createRemoteJWKSet, errors as joseErrors, jwtVerify, type JWTPayload, type JWTVerifyGetKey } from 'jose';
import { z } from 'zod';
import type { AuthSettings } from '../config';
import { AuthError, ChatBackendError } from '../errors';

/** Validates an `Authorization` header value and returns the token claims. */
export type BearerVerifier = (authorization: string | undefined) => Promise<JWTPayload>;

const openIdConfigurationSchema = z.object({ jwks_uri: z.string().url() });

export function extractBearerToken(authorization: string | undefined): string {
	if (!authorization) throw new AuthError('Missing or invalid Authorization header');
	const [scheme, token, ...rest] = authorization.trim().split(/\s+/);
	if (!scheme || scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
		throw new AuthError('Missing or invalid Authorization header');
	}
	return token;
}

export function createJwtVerifier(getKey: JWTVerifyGetKey, settings: AuthSettings): BearerVerifier {
	return async (authorization) => {
		const token = extractBearerToken(authorization);
		try {
			const { payload } = await jwtVerify(token, getKey, {
				issuer: settings.issuer,
				audience: settings.audience,
				algorithms: ['RS256'],
			});
			return payload;
		} catch (error) {
			if (error instanceof joseErrors.JOSEError) {
				throw new AuthError(`Token validation failed: ${error.code}`);
			}
			throw error;
		}
	};
}

export async function discoverJwks(issuer: string, fetchImpl: typeof fetch = fetch): Promise<JWTVerifyGetKey> {
	const wellKnown = `${issuer.replace(/\/+$/, '')}/.well-known/openid-configuration`;
	try {
		const res = await fetchImpl(wellKnown, { signal: AbortSignal.timeout(10_000) });
		if (!res.ok) throw new Error(`HTTP ${res.status}`);
		const { jwks_uri } = openIdConfigurationSchema.parse(await res.json());
		return createRemoteJWKSet(new URL(jwks_uri));
	} catch (error) {
		throw new ChatBackendError('Failed to fetch OIDC configuration from issuer', 500, { cause: error });
	}
}

/**
 * Verifier for a live identity provider. Discovery runs on the first request
 * and is cached; a failed discovery is retried on the next request.
 */
export function createOidcVerifier(settings: AuthSettings, fetchImpl: typeof fetch = fetch): BearerVerifier {
	let cached: Promise<BearerVerifier> | null = null;

	const load = (): Promise<BearerVerifier> => {
		if (cached) return cached;
		const pending = discoverJwks(settings.issuer, fetchImpl).then((keys) => createJwtVerifier(keys, settings));
		pending.catch(() => {
			if (cached === pending) cached = null;
		});
		cached = pending;
		return pending;
	};

	return async (authorization) => {
		extractBearerToken(authorization);
		const verify = await load();
		return verify(authorization);
	};
}
