import { describe, it, expect, beforeEach } from 'vitest'
import { createFakeQuestrade, FAKE_API_SERVER } from '../../test/fakeQuestrade.js'
import { AuthError } from './errors.js'
import { SessionManager } from './sessionManager.js'

describe('SessionManager', () => {
	let clock: number
	let fake: ReturnType<typeof createFakeQuestrade>
	let manager: SessionManager

	beforeEach(() => {
		clock = 1_700_000_000_000
		fake = createFakeQuestrade({ refreshToken: 'test-refresh', expiresIn: 1800 })
		manager = new SessionManager({
			fetch: fake.fetch,
			expiryMarginMs: 0,
			now: () => clock,
		})
	})

	describe('authenticate', () => {
		it('yields a non-empty access token expiring in the future', async () => {
			const session = await manager.authenticate('test-refresh', false)

			expect(session.accessToken).toBe('access-1')
			expect(session.expiresAt).toBeGreaterThan(clock)
			expect(manager.getSession()).toEqual(session)
		})

		it('accepts the rotated refresh token and rejects the consumed one', async () => {
			const first = await manager.authenticate('test-refresh', false)
			const second = await manager.authenticate(first.refreshToken, false)

			expect(second.accessToken).toBe('access-2')
			expect(second.refreshToken).toBe('refresh-2')

			await expect(
				manager.authenticate(first.refreshToken, false),
			).rejects.toBeInstanceOf(AuthError)
		})

		it('keeps the previous session when an exchange fails', async () => {
			const session = await manager.authenticate('test-refresh', false)

			await expect(
				manager.authenticate('not-a-valid-token', false),
			).rejects.toMatchObject({ kind: 'TokenRejected' })

			expect(manager.getSession()).toEqual(session)
		})

		it('waits for an exchange in flight before starting another', async () => {
			const release = fake.holdExchanges()

			const first = manager.authenticate('test-refresh', false)
			const second = manager.authenticate('refresh-1', false)
			await Promise.resolve()

			// Only the first exchange has reached the endpoint
			expect(fake.exchanges).toEqual(['test-refresh'])

			release()
			await expect(first).resolves.toMatchObject({ accessToken: 'access-1' })
			await expect(second).resolves.toMatchObject({ accessToken: 'access-2' })
			expect(fake.exchanges).toEqual(['test-refresh', 'refresh-1'])
		})

		it('returns copies that cannot alter the held session', async () => {
			const session = await manager.authenticate('test-refresh', false)
			session.accessToken = 'tampered'

			expect(manager.getSession()?.accessToken).toBe('access-1')
		})
	})

	describe('ensureValid', () => {
		it('fails with NotAuthenticated before any authenticate', async () => {
			await expect(manager.ensureValid()).rejects.toMatchObject({
				name: 'AuthError',
				kind: 'NotAuthenticated',
			})
			expect(fake.fetch).not.toHaveBeenCalled()
		})

		it('returns the held session while the token is valid', async () => {
			await manager.authenticate('test-refresh', false)
			clock += 1000

			const session = await manager.ensureValid()

			expect(session.accessToken).toBe('access-1')
			expect(fake.exchanges).toHaveLength(1)
		})

		it('refreshes an expired token with the held refresh token', async () => {
			await manager.authenticate('test-refresh', false)
			clock += 1800 * 1000

			const session = await manager.ensureValid()

			expect(session).toMatchObject({
				accessToken: 'access-2',
				refreshToken: 'refresh-2',
				apiServer: FAKE_API_SERVER,
			})
			expect(fake.exchanges).toEqual(['test-refresh', 'refresh-1'])
		})

		it('performs exactly one exchange for concurrent callers', async () => {
			await manager.authenticate('test-refresh', false)
			clock += 1800 * 1000

			const sessions = await Promise.all(
				Array.from({ length: 5 }, () => manager.ensureValid()),
			)

			expect(sessions.map((s) => s.accessToken)).toEqual(
				Array(5).fill('access-2'),
			)
			expect(fake.exchanges).toEqual(['test-refresh', 'refresh-1'])

			await manager.ensureValid()
			expect(fake.exchanges).toHaveLength(2)
		})

		it('shares a failed refresh with every waiter and drops the session', async () => {
			await manager.authenticate('test-refresh', false)
			clock += 1800 * 1000
			// Consume the held refresh token elsewhere
			await createSessionElsewhere(fake)

			const results = await Promise.allSettled([
				manager.ensureValid(),
				manager.ensureValid(),
			])

			expect(results.map((r) => r.status)).toEqual(['rejected', 'rejected'])
			expect(fake.exchanges).toEqual(['test-refresh', 'refresh-1', 'refresh-1'])
			expect(manager.getSession()).toBeNull()
			await expect(manager.ensureValid()).rejects.toMatchObject({
				kind: 'NotAuthenticated',
			})
		})

		it('applies the expiry margin', async () => {
			const early = new SessionManager({
				fetch: fake.fetch,
				expiryMarginMs: 60_000,
				now: () => clock,
			})
			await early.authenticate('test-refresh', false)
			clock += 1800 * 1000 - 60_000

			const session = await early.ensureValid()

			expect(session.accessToken).toBe('access-2')
		})

		it('keeps serving a valid session while a failing authenticate runs', async () => {
			await manager.authenticate('test-refresh', false)
			const release = fake.holdExchanges()
			const failing = manager.authenticate('not-a-valid-token', false)

			const session = await manager.ensureValid()
			release()

			expect(session.accessToken).toBe('access-1')
			await expect(failing).rejects.toMatchObject({ kind: 'TokenRejected' })
			expect(manager.getSession()?.accessToken).toBe('access-1')
		})

		it('waits for an authenticate in flight', async () => {
			const release = fake.holdExchanges()
			const authenticating = manager.authenticate('test-refresh', false)

			const waiting = manager.ensureValid()
			release()

			await expect(waiting).resolves.toEqual(await authenticating)
			expect(fake.exchanges).toEqual(['test-refresh'])
		})
	})

	describe('expire', () => {
		it('forces a refresh on the next call', async () => {
			const session = await manager.authenticate('test-refresh', false)

			manager.expire(session.accessToken)
			const next = await manager.ensureValid()

			expect(next.accessToken).toBe('access-2')
		})

		it('ignores an access token that was already replaced', async () => {
			await manager.authenticate('test-refresh', false)
			const current = await manager.authenticate('refresh-1', false)

			manager.expire('access-1')

			expect(manager.getSession()).toEqual(current)
		})
	})

	it('starts from a seeded session', async () => {
		const seeded = new SessionManager({
			fetch: fake.fetch,
			now: () => clock,
			session: {
				accessToken: 'seeded-access',
				refreshToken: 'seeded-refresh',
				tokenType: 'Bearer',
				expiresAt: clock + 600_000,
				apiServer: FAKE_API_SERVER,
				isPractice: false,
			},
		})

		await expect(seeded.ensureValid()).resolves.toMatchObject({
			accessToken: 'seeded-access',
		})
		seeded.clear()
		expect(seeded.getSession()).toBeNull()
	})
})

async function createSessionElsewhere(fake: ReturnType<typeof createFakeQuestrade>) {
	const other = new SessionManager({ fetch: fake.fetch })
	await other.authenticate(fake.currentRefreshToken, false)
}
