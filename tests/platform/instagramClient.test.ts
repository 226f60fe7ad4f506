import { InstagramClient } from '../../src/platform/instagramClient';
import { ChallengeRequiredError, PlatformError, ThreadNotFoundError, UserNotFoundError } from '../../src/platform/errors';

jest.mock('instagram-private-api', () => {
  class IgResponseError extends Error {
    constructor(message: string, public response: { body: unknown } = { body: {} }) {
      super(message);
    }
  }
  class IgLoginTwoFactorRequiredError extends IgResponseError {}
  class IgCheckpointError extends IgResponseError {}
  class IgNotFoundError extends IgResponseError {}

  class IgApiClient {
    static instances: IgApiClient[] = [];

    inboxPages: Array<Array<{ thread_id: string; users: Array<{ pk: number }> }>> = [];
    threadItems: Array<{ item_id: string; user_id: number; timestamp: string; text?: string }> = [];
    threadError: Error | null = null;
    inbox: { items: jest.Mock; isMoreAvailable: () => boolean } | null = null;
    sent: Array<{ recipients: unknown; text: string }> = [];

    state = {
      deserialize: jest.fn(async () => undefined),
      serialize: jest.fn(async () => ({ constants: { APP_VERSION: 'x' }, cookies: 'jar' })),
      generateDevice: jest.fn(),
    };
    account = {
      login: jest.fn(async () => ({ pk: 42 })),
      twoFactorLogin: jest.fn(async () => ({})),
      currentUser: jest.fn(async () => ({ pk: 42 })),
    };
    challenge = {
      auto: jest.fn(async () => ({})),
      sendSecurityCode: jest.fn(async () => ({})),
    };
    user = {
      getIdByUsername: jest.fn(async () => 777),
    };
    feed = {
      directInbox: jest.fn(() => {
        const pages = [...this.inboxPages];
        let served = 0;
        this.inbox = {
          items: jest.fn(async () => pages[served++] ?? []),
          isMoreAvailable: () => served < pages.length,
        };
        return this.inbox;
      }),
      directThread: jest.fn(() => ({
        items: jest.fn(async () => {
          if (this.threadError) throw this.threadError;
          return this.threadItems;
        }),
      })),
    };
    entity = {
      directThread: jest.fn((recipients: unknown) => ({
        broadcastText: jest.fn(async (text: string) => {
          this.sent.push({ recipients, text });
        }),
      })),
    };

    constructor() {
      IgApiClient.instances.push(this);
    }
  }

  return { IgApiClient, IgCheckpointError, IgLoginTwoFactorRequiredError, IgNotFoundError };
});

interface FakeIg {
  inboxPages: Array<Array<{ thread_id: string; users: Array<{ pk: number }> }>>;
  threadItems: Array<{ item_id: string; user_id: number; timestamp: string; text?: string }>;
  threadError: Error | null;
  inbox: { items: jest.Mock; isMoreAvailable: () => boolean } | null;
  sent: Array<{ recipients: unknown; text: string }>;
  state: { deserialize: jest.Mock; serialize: jest.Mock; generateDevice: jest.Mock };
  account: { login: jest.Mock; twoFactorLogin: jest.Mock; currentUser: jest.Mock };
  challenge: { auto: jest.Mock; sendSecurityCode: jest.Mock };
  user: { getIdByUsername: jest.Mock };
  feed: { directInbox: jest.Mock; directThread: jest.Mock };
  entity: { directThread: jest.Mock };
}

type ResponseErrorClass = new (message: string, response?: { body: unknown }) => Error;

interface MockedModule {
  IgApiClient: { instances: FakeIg[] };
  IgCheckpointError: ResponseErrorClass;
  IgLoginTwoFactorRequiredError: ResponseErrorClass;
  IgNotFoundError: ResponseErrorClass;
}

const mocked = jest.requireMock<MockedModule>('instagram-private-api');
const CREDENTIALS = { username: 'bot_account', password: 'test-secret' };

function currentIg(): FakeIg {
  const instances = mocked.IgApiClient.instances;
  return instances[instances.length - 1];
}

function thread(id: string, ...userIds: number[]) {
  return { thread_id: id, users: userIds.map(pk => ({ pk })) };
}

describe('InstagramClient', () => {
  let client: InstagramClient;

  beforeEach(() => {
    mocked.IgApiClient.instances.length = 0;
    client = new InstagramClient();
  });

  describe('sessions', () => {
    test('a fresh login generates a device and returns the account ID', async () => {
      await expect(client.authenticate(CREDENTIALS)).resolves.toEqual({ userId: '42' });
      expect(currentIg().state.generateDevice).toHaveBeenCalledWith('bot_account');
      expect(currentIg().account.login).toHaveBeenCalledWith('bot_account', 'test-secret');
    });

    test('a restored session keeps its device', async () => {
      await client.restore('{"cookies":"jar"}');
      await client.authenticate(CREDENTIALS);

      expect(currentIg().state.deserialize).toHaveBeenCalledWith('{"cookies":"jar"}');
      expect(currentIg().state.generateDevice).not.toHaveBeenCalled();
    });

    test('serializes the session without library constants', async () => {
      await expect(client.serializeSession()).resolves.toBe('{"cookies":"jar"}');
    });

    test('clearing the session starts over with a new API client', async () => {
      await client.restore('{"cookies":"jar"}');
      client.clearSession();
      await client.authenticate(CREDENTIALS);

      expect(mocked.IgApiClient.instances).toHaveLength(2);
      expect(currentIg().state.generateDevice).toHaveBeenCalledWith('bot_account');
    });
  });

  describe('challenges', () => {
    test('completes a two-factor login with the identifier from the login error', async () => {
      const body = { two_factor_info: { two_factor_identifier: 'tf-id' } };
      currentIg().account.login.mockRejectedValueOnce(
        new mocked.IgLoginTwoFactorRequiredError('two_factor_required', { body })
      );

      const login = client.authenticate(CREDENTIALS);
      await expect(login).rejects.toBeInstanceOf(ChallengeRequiredError);
      await expect(login).rejects.toMatchObject({ challengeType: 'two-factor' });

      await expect(client.submitChallengeCode('123456')).resolves.toEqual({ userId: '42' });
      expect(currentIg().account.twoFactorLogin).toHaveBeenCalledWith({
        username: 'bot_account',
        verificationCode: '123456',
        twoFactorIdentifier: 'tf-id',
        verificationMethod: '1',
        trustThisDevice: '1',
      });
      expect(currentIg().challenge.sendSecurityCode).not.toHaveBeenCalled();
    });

    test('fails plainly when the two-factor error carries no identifier', async () => {
      currentIg().account.login.mockRejectedValueOnce(
        new mocked.IgLoginTwoFactorRequiredError('two_factor_required', { body: { two_factor_info: {} } })
      );

      const login = client.authenticate(CREDENTIALS);
      await expect(login).rejects.toThrow('Two-factor login required but no identifier was returned');
      await expect(login).rejects.toBeInstanceOf(PlatformError);
      await expect(login).rejects.not.toBeInstanceOf(ChallengeRequiredError);
    });

    test('answers a checkpoint with a security code', async () => {
      currentIg().account.login.mockRejectedValueOnce(new mocked.IgCheckpointError('checkpoint_required'));

      await expect(client.authenticate(CREDENTIALS)).rejects.toMatchObject({ challengeType: 'checkpoint' });
      expect(currentIg().challenge.auto).toHaveBeenCalledWith(true);

      await expect(client.submitChallengeCode('654321')).resolves.toEqual({ userId: '42' });
      expect(currentIg().challenge.sendSecurityCode).toHaveBeenCalledWith('654321');
      expect(currentIg().account.twoFactorLogin).not.toHaveBeenCalled();
    });

    test('rejects a code when no challenge is pending', async () => {
      await expect(client.submitChallengeCode('123456')).rejects.toThrow('No challenge is pending');
    });

    test('passes other login errors through', async () => {
      const error = new Error('The password you entered is incorrect.');
      currentIg().account.login.mockRejectedValueOnce(error);

      await expect(client.authenticate(CREDENTIALS)).rejects.toBe(error);
    });
  });

  describe('users', () => {
    test('returns the user ID as a string', async () => {
      await expect(client.lookupUserId('friend')).resolves.toBe('777');
    });

    test('reports an unknown handle as UserNotFoundError', async () => {
      currentIg().user.getIdByUsername.mockRejectedValueOnce(new Error('User with exact username not found'));

      await expect(client.lookupUserId('nobody')).rejects.toBeInstanceOf(UserNotFoundError);
    });
  });

  describe('inbox', () => {
    test('pages through the inbox until no more threads are available', async () => {
      currentIg().inboxPages = [[thread('t1', 42, 777), thread('t2', 42, 5)], [thread('t3', 42, 6)]];

      await expect(client.listRecentThreads(100)).resolves.toEqual([
        { threadId: 't1', participantIds: ['42', '777'] },
        { threadId: 't2', participantIds: ['42', '5'] },
        { threadId: 't3', participantIds: ['42', '6'] },
      ]);
      expect(currentIg().inbox?.items).toHaveBeenCalledTimes(2);
    });

    test('stops paging once the limit is reached and trims to it', async () => {
      currentIg().inboxPages = [[thread('t1', 1), thread('t2', 2), thread('t3', 3)], [thread('t4', 4)]];

      const threads = await client.listRecentThreads(2);

      expect(threads.map(t => t.threadId)).toEqual(['t1', 't2']);
      expect(currentIg().inbox?.items).toHaveBeenCalledTimes(1);
    });
  });

  describe('threads', () => {
    test('converts microsecond timestamps to epoch milliseconds', async () => {
      currentIg().threadItems = [
        { item_id: 'i1', user_id: 777, timestamp: '1714564800000000', text: 'hi' },
        { item_id: 'i2', user_id: 42, timestamp: '1714564790123456' },
      ];

      const snapshot = await client.fetchThread('t1');

      expect(currentIg().feed.directThread).toHaveBeenCalledWith({ id: 't1', cursor: '' });
      expect(snapshot).toEqual({
        threadId: 't1',
        messages: [
          { id: 'i1', senderId: '777', text: 'hi', timestamp: 1714564800000 },
          { id: 'i2', senderId: '42', text: '', timestamp: 1714564790123 },
        ],
      });
      expect(new Date(snapshot.messages[0].timestamp).toISOString()).toBe('2024-05-01T12:00:00.000Z');
    });

    test('reports a missing thread as ThreadNotFoundError', async () => {
      currentIg().threadError = new mocked.IgNotFoundError('404 Not Found');

      await expect(client.fetchThread('t1')).rejects.toEqual(new ThreadNotFoundError('t1'));
      await expect(client.fetchThread('t1')).rejects.toBeInstanceOf(ThreadNotFoundError);
    });

    test('passes other fetch errors through', async () => {
      const error = new Error('socket hang up');
      currentIg().threadError = error;

      await expect(client.fetchThread('t1')).rejects.toBe(error);
    });
  });

  test('sends a direct message addressed to user IDs', async () => {
    await client.sendDirectMessage('Auto reply', ['777']);

    expect(currentIg().entity.directThread).toHaveBeenCalledWith(['777']);
    expect(currentIg().sent).toEqual([{ recipients: ['777'], text: 'Auto reply' }]);
  });
});
