import { beforeAll, describe, expect, it, vi } from 'vitest';
import { SignJWT, createLocalJWKSet, exportJWK, generateKeyPair, type JWTVerifyGetKey, type KeyLike } from 'jose';
import { AuthError, ChatBackendError } from '../errors';
import { createJwtVerifier, createOidcVerifier, discoverJwks, extractBearerToken } from './oidc';

const settings = { issuer: 'https://issuer.example/', audience: 'chat-api' };

describe('extractBearerToken', () => {
	it('returns the token of a bearer header', () => {
		expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
		expect(extractBearerToken('bearer   token')).toBe('token');
	});

	it('rejects missing or malformed headers', () => {
		expect(() => extractBearerToken(undefined)).toThrow(AuthError);
		expect(() => extractBearerToken('Basic dXNlcjpwYXNz')).toThrow(AuthError);
		expect(() => extractBearerToken('Bearer')).toThrow(AuthError);
		expect(() => extractBearerToken('Bearer a b')).toThrow(AuthError);
	});
});

describe('createJwtVerifier', () => {
	let privateKey: KeyLike;
	let keys: JWTVerifyGetKey;

	beforeAll(async () => {
		const pair = await generateKeyPair('RS256');
		privateKey = pair.privateKey;
		const jwk = await exportJWK(pair.publicKey);
		keys = createLocalJWKSet({ keys: [{ ...jwk, kid: 'test-key', alg: 'RS256' }] });
	});

	function sign(overrides: { audience?: string; expiresAt?: number } = {}): Promise<string> {
		return new SignJWT({ scope: 'chat' })
			.setProtectedHeader({ alg: 'RS256', kid: 'test-key' })
			.setSubject('user-1')
			.setIssuer(settings.issuer)
			.setAudience(overrides.audience ?? settings.audience)
			.setIssuedAt()
			.setExpirationTime(overrides.expiresAt ?? '5m')
			.sign(privateKey);
	}

	it('returns the claims of a valid token', async () => {
		const verify = createJwtVerifier(keys, settings);
		const claims = await verify(`Bearer ${await sign()}`);
		expect(claims.sub).toBe('user-1');
		expect(claims.scope).toBe('chat');
	});

	it('rejects a token for another audience', async () => {
		const verify = createJwtVerifier(keys, settings);
		await expect(verify(`Bearer ${await sign({ audience: 'other-api' })}`)).rejects.toThrow(
			'Token validation failed: ERR_JWT_CLAIM_VALIDATION_FAILED'
		);
	});

	it('rejects an expired token', async () => {
		const verify = createJwtVerifier(keys, settings);
		const expiresAt = Math.floor(Date.now() / 1000) - 3600;
		await expect(verify(`Bearer ${await sign({ expiresAt })}`)).rejects.toThrow('Token validation failed: ERR_JWT_EXPIRED');
	});

	it('rejects garbage', async () => {
		const verify = createJwtVerifier(keys, settings);
		await expect(verify('Bearer not-a-jwt')).rejects.toBeInstanceOf(AuthError);
	});
});

describe('discoverJwks', () => {
	it('reads jwks_uri from the issuer metadata', async () => {
		const fetchImpl = vi.fn(async () => Response.json({ jwks_uri: 'https://issuer.example/.well-known/jwks.json' }));
		const getKey = await discoverJwks('https://issuer.example/', fetchImpl);
		expect(typeof getKey).toBe('function');
		expect(fetchImpl).toHaveBeenCalledWith('https://issuer.example/.well-known/openid-configuration', expect.anything());
	});

	it('fails with a server error when the metadata is unusable', async () => {
		const fetchImpl = vi.fn(async () => Response.json({ issuer: 'no jwks here' }));
		const error = await discoverJwks('https://issuer.example', fetchImpl).catch((e: unknown) => e);
		expect(error).toBeInstanceOf(ChatBackendError);
		expect(error).toMatchObject({ status: 500, message: 'Failed to fetch OIDC configuration from issuer' });
	});
});

describe('createOidcVerifier', () => {
	it('rejects requests without a token before contacting the issuer', async () => {
		const fetchImpl = vi.fn(async () => Response.json({}));
		const verify = createOidcVerifier(settings, fetchImpl);
		await expect(verify(undefined)).rejects.toBeInstanceOf(AuthError);
		expect(fetchImpl).not.toHaveBeenCalled();
	});

	it('retries discovery after a failure', async () => {
		const fetchImpl = vi.fn(async () => new Response('down', { status: 503 }));
		const verify = createOidcVerifier(settings, fetchImpl);
		await expect(verify('Bearer a.b.c')).rejects.toThrow('Failed to fetch OIDC configuration from issuer');
		await expect(verify('Bearer a.b.c')).rejects.toThrow('Failed to fetch OIDC configuration from issuer');
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});
});
