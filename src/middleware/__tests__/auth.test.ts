/**
 * Unit tests for auth middleware
 */
import { AuthenticationError, AuthorizationError } from '../../lib/errors';
import type { TokenVerifier } from '../../lib/firebaseAdmin';
import { authenticate, requireStaff, verifyBearer } from '../auth';
import {
  createMockNext,
  createMockPrincipal,
  createMockRequest,
  createMockResponse,
} from '../../__tests__/helpers/mockRequest';
import { MemoryStore } from '../../__tests__/helpers/memoryStore';

describe('Auth Middleware', () => {
  let store: MemoryStore;
  const verifyToken: jest.MockedFunction<TokenVerifier> = jest.fn();

  beforeEach(async () => {
    jest.clearAllMocks();
    store = new MemoryStore();
    await store.users.create({ uid: 'test-uid-123', username: 'tester', email: 'test@example.com' });
  });

  async function run(handler: ReturnType<typeof authenticate>, authorization?: string) {
    const req = createMockRequest({ headers: authorization ? { authorization } : {} });
    const next = createMockNext();
    await handler(req, createMockResponse().res, next);
    return { req, next };
  }

  describe('authenticate', () => {
    test('should attach the principal for a registered account', async () => {
      verifyToken.mockResolvedValue({ uid: 'test-uid-123', email: 'test@example.com' });

      const { req, next } = await run(authenticate({ users: store.users, verifyToken }), 'Bearer valid-token');

      expect(verifyToken).toHaveBeenCalledWith('valid-token');
      expect(next).toHaveBeenCalledWith();
      expect(req.principal).toEqual({
        id: 1,
        uid: 'test-uid-123',
        username: 'tester',
        roles: new Set(['customer']),
      });
    });

    test('should reject a missing header without calling the verifier', async () => {
      const { next } = await run(authenticate({ users: store.users, verifyToken }));
      expect(verifyToken).not.toHaveBeenCalled();
      expect(next).toHaveBeenCalledWith(new AuthenticationError('Missing bearer token'));
    });

    test('should reject a non-bearer scheme', async () => {
      const { next } = await run(authenticate({ users: store.users, verifyToken }), 'Basic dXNlcg==');
      expect(next).toHaveBeenCalledWith(new AuthenticationError('Missing bearer token'));
    });

    test('should map verifier failures to 401', async () => {
      verifyToken.mockRejectedValue(new Error('Token expired'));
      const { req, next } = await run(authenticate({ users: store.users, verifyToken }), 'Bearer stale');
      expect(next).toHaveBeenCalledWith(new AuthenticationError('Invalid or expired token'));
      expect(req.principal).toBeUndefined();
    });

    test('should reject a verified account without a profile', async () => {
      verifyToken.mockResolvedValue({ uid: 'someone-else' });
      const { next } = await run(authenticate({ users: store.users, verifyToken }), 'Bearer valid-token');
      const [err] = next.mock.calls[0];
      expect(err).toBeInstanceOf(AuthenticationError);
      expect(err).toHaveProperty('message', 'No profile registered for this account');
    });
  });

  describe('verifyBearer', () => {
    test('should attach the identity even without a profile', async () => {
      verifyToken.mockResolvedValue({ uid: 'brand-new' });
      const { req, next } = await run(verifyBearer(verifyToken), 'Bearer fresh');
      expect(next).toHaveBeenCalledWith();
      expect(req.identity).toEqual({ uid: 'brand-new' });
      expect(req.principal).toBeUndefined();
    });
  });

  describe('requireStaff', () => {
    test.each([
      ['staff', true],
      ['manager', true],
      ['delivery-crew', false],
      ['customer', false],
    ] as const)('%s passes: %s', (role, allowed) => {
      const req = createMockRequest({ principal: createMockPrincipal([role]) });
      const next = createMockNext();
      requireStaff()(req, createMockResponse().res, next);
      if (allowed) expect(next).toHaveBeenCalledWith();
      else expect(next).toHaveBeenCalledWith(new AuthorizationError());
    });

    test('should require authentication first', () => {
      const next = createMockNext();
      requireStaff()(createMockRequest(), createMockResponse().res, next);
      expect(next.mock.calls[0][0]).toBeInstanceOf(AuthenticationError);
    });
  });
});
