import { NO_REPLY } from '../../test/support/fake-server';
import { TestClient, createTestClient, nextEvent, waitFor } from '../../test/support/helpers';
import { ProtocolError } from '../errors/client.errors';
import { LOGIC_VIEW_CHANNEL, RULES_CHANNEL } from './subscription-channels';
import { SubscriptionsService } from './subscriptions.service';

describe('SubscriptionsService', () => {
  let ctx: TestClient;
  let subscriptions: SubscriptionsService;
  let issued: number;

  beforeEach(async () => {
    issued = 0;
    ctx = await createTestClient();
    ctx.server
      .on('store.subscribe', () => ({ subscriptionId: `s${++issued}` }))
      .on('store.unsubscribe', () => true);
    subscriptions = ctx.moduleRef.get(SubscriptionsService);
    await ctx.client.connect();
  });

  afterEach(async () => {
    ctx.client.disconnect();
    await ctx.moduleRef.close();
  });

  it('sends the query and its params to the store', async () => {
    await subscriptions.subscribe('todos', { done: false }, () => undefined);

    expect(ctx.server.current.requestsOf('store.subscribe')).toEqual([
      { query: 'todos', params: { done: false }, id: 1, type: 'store.subscribe' },
    ]);
    expect(subscriptions.count).toBe(1);
  });

  it('uses the operations and payload of the given channel', async () => {
    ctx.server
      .on('rules.subscribe', () => ({ subscriptionId: 'r1' }))
      .on('logic.subscribeView', () => ({ subscriptionId: 'v1' }))
      .on('logic.unsubscribeView', () => true);

    await subscriptions.subscribe('orders.*', undefined, () => undefined, RULES_CHANNEL);
    const view = await subscriptions.subscribe('totals', undefined, () => undefined, LOGIC_VIEW_CHANNEL);
    view.unsubscribe();
    await waitFor(() => ctx.server.current.requestsOf('logic.unsubscribeView').length === 1);

    const { requests } = ctx.server.current;
    expect(requests[0]).toEqual({ pattern: 'orders.*', id: 1, type: 'rules.subscribe' });
    expect(requests[1]).toEqual({ name: 'totals', id: 2, type: 'logic.subscribeView' });
    expect(requests[2]).toEqual({ subscriptionId: 'v1', id: 3, type: 'logic.unsubscribeView' });
  });

  it('rejects a subscribe result without a subscription id', async () => {
    ctx.server.on('store.subscribe', () => ({ data: [] }));

    await expect(subscriptions.subscribe('todos', undefined, () => undefined)).rejects.toThrow(
      new ProtocolError('Subscribe response without a subscriptionId'),
    );
    expect(subscriptions.count).toBe(0);
  });

  it('drops the subscription again when the initial delivery throws', async () => {
    ctx.server.on('store.subscribe', () => ({ subscriptionId: 's1', data: [] }));

    await expect(
      subscriptions.subscribe('todos', undefined, () => {
        throw new Error('render failed');
      }),
    ).rejects.toThrow('render failed');

    expect(subscriptions.count).toBe(0);
    await waitFor(() => ctx.server.current.requestsOf('store.unsubscribe').length === 1);
  });

  it('keeps dispatching to other subscriptions when one callback throws', async () => {
    const received: unknown[] = [];
    await subscriptions.subscribe('a', undefined, () => {
      throw new Error('boom');
    });
    await subscriptions.subscribe('b', undefined, (data) => received.push(data));

    ctx.server.current.deliver({ type: 'push', subscriptionId: 's1', channel: 'a', data: 1 });
    ctx.server.current.deliver({ type: 'push', subscriptionId: 's2', channel: 'b', data: 2 });

    expect(received).toEqual([2]);
  });

  it('cancels on the server a subscription removed while its resubscribe was in flight', async () => {
    const handle = await subscriptions.subscribe('todos', undefined, () => undefined);
    ctx.server.on('store.subscribe', () => NO_REPLY);

    const reconnected = nextEvent(ctx.client, 'reconnected');
    ctx.server.current.drop();
    await waitFor(() => ctx.server.connections.length === 2 && ctx.server.current.requestsOf('store.subscribe').length === 1);

    expect(handle.unsubscribe()).toBe(true);
    expect(subscriptions.count).toBe(0);

    const [resubscribe] = ctx.server.current.requestsOf('store.subscribe');
    ctx.server.current.deliver({ id: resubscribe?.id, type: 'result', data: { subscriptionId: 's9' } });
    await reconnected;
    await waitFor(() => ctx.server.current.requestsOf('store.unsubscribe').length === 1);

    expect(ctx.server.current.requestsOf('store.unsubscribe')[0]).toMatchObject({ subscriptionId: 's9' });
  });
});
