import '../../api';
import { setServices } from '../../core/services';
import { LoginHandoffDispatcher } from '../../lib/loginHandoff/loginHandoffDispatcher';
import { findRoute } from '../../utils/routesRegistry';
import type { RouteMethod } from '../../utils/routesRegistry';
import { makeRegistry, makeRequest, makeResolver, makeResponse } from '../helpers/fakes';

const call = async (method: RouteMethod, path: string, req = makeRequest()) => {
  const route = findRoute(method, path);
  if (!route) throw new Error(`No ${method} route for ${path}`);
  const { res, recorded } = makeResponse();
  await route.handler(req, res, jest.fn());
  return recorded;
};

const install = (result?: string) => {
  const bots = makeRegistry();
  const fakes = makeResolver(result);
  setServices({ bots, loginHandoff: new LoginHandoffDispatcher({ bots, resolver: fakes.resolver }) });
  return fakes;
};

describe('login handoff routes', () => {
  test('registers both bindings for both protocols', () => {
    expect(findRoute('post', '/Api/OAuth')?.options).toEqual({ protected: true });
    expect(findRoute('get', '/Api/OAuth/:botName/:oAuthUrl')).toBeDefined();
    expect(findRoute('post', '/Api/OAuth/:botName/:oAuthUrl')).toBeDefined();
    expect(findRoute('post', '/Api/OpenId')).toBeDefined();
    expect(findRoute('get', '/Api/OpenId/:botName/:openIdUrl')).toBeDefined();
    expect(findRoute('post', '/Api/OpenId/:botName/:openIdUrl')).toBeDefined();
    expect(findRoute('get', '/Api/OAuth')).toBeUndefined();
  });

  test('POST /Api/OAuth wraps a successful login in the envelope', async () => {
    const { loginViaSteamOAuth } = install('https://example.com/finish?token=abc');

    const recorded = await call('post', '/Api/OAuth', makeRequest({
      body: { BotName: 'Bot1', OAuthUrl: 'https://steamcommunity.com/oauth/login?client_id=1' },
    }));

    expect(recorded).toEqual({
      statusCode: 200,
      body: {
        Success: true,
        Message: 'OK',
        Data: { Success: true, LoginUrl: 'https://example.com/finish?token=abc' },
      },
    });
    expect(loginViaSteamOAuth).toHaveBeenCalledTimes(1);
  });

  test('POST /Api/OAuth with an empty bot name is a 400', async () => {
    const { loginViaSteamOAuth } = install();

    const recorded = await call('post', '/Api/OAuth', makeRequest({ body: { BotName: '', OAuthUrl: 'x' } }));

    expect(recorded).toEqual({
      statusCode: 400,
      body: { Success: false, Message: 'BotName or OAuthUrl can not be null', Data: null },
    });
    expect(loginViaSteamOAuth).not.toHaveBeenCalled();
  });

  test('POST /Api/OAuth without a body is a 400', async () => {
    install();

    const recorded = await call('post', '/Api/OAuth', makeRequest({ body: undefined }));

    expect(recorded).toEqual({
      statusCode: 400,
      body: { Success: false, Message: 'Request can not be null', Data: null },
    });
  });

  test('POST /Api/OAuth treats wrongly typed fields as missing', async () => {
    install();

    const recorded = await call('post', '/Api/OAuth', makeRequest({ body: { BotName: 42, OAuthUrl: 'x' } }));

    expect(recorded.statusCode).toBe(400);
    expect(recorded.body).toEqual({ Success: false, Message: 'BotName or OAuthUrl can not be null', Data: null });
  });

  test('POST /Api/OAuth for an unknown bot is a 400 naming it', async () => {
    install();

    const recorded = await call('post', '/Api/OAuth', makeRequest({ body: { BotName: 'GhostBot', OAuthUrl: 'x' } }));

    expect(recorded).toEqual({
      statusCode: 400,
      body: { Success: false, Message: 'Could not find any bot named GhostBot!', Data: null },
    });
  });

  test('unknown bot message honours Accept-Language', async () => {
    install();

    const recorded = await call('post', '/Api/OpenId', makeRequest({
      body: { BotName: 'GhostBot', OpenIdUrl: 'x' },
      headers: { 'accept-language': 'zh-CN,zh;q=0.9' },
    }));

    expect(recorded.body).toEqual({ Success: false, Message: '找不到名为 GhostBot 的机器人！', Data: null });
  });

  test('GET /Api/OpenId/:botName/:openIdUrl reports a failed login as 200 with Success=false', async () => {
    const { loginViaSteamOpenId } = install('error:timeout');

    const recorded = await call('get', '/Api/OpenId/:botName/:openIdUrl', makeRequest({
      method: 'GET',
      params: { botName: 'Bot1', openIdUrl: 'someOpenIdUrl' },
    }));

    expect(recorded).toEqual({
      statusCode: 200,
      body: { Success: true, Message: 'OK', Data: { Success: false, LoginUrl: 'error:timeout' } },
    });
    expect(loginViaSteamOpenId).toHaveBeenCalledWith(expect.objectContaining({ name: 'Bot1' }), 'someOpenIdUrl');
  });

  test('route binding with an empty seed url names only the url field', async () => {
    install();

    const recorded = await call('post', '/Api/OAuth/:botName/:oAuthUrl', makeRequest({
      params: { botName: 'Bot1', oAuthUrl: '' },
    }));

    expect(recorded).toEqual({
      statusCode: 400,
      body: { Success: false, Message: 'OAuthUrl can not be null', Data: null },
    });
  });

  test('body and route bindings return the same payload', async () => {
    install('https://example.com/done');
    const seedUrl = 'https://steamcommunity.com/openid/login?openid.mode=checkid_setup';

    const fromBody = await call('post', '/Api/OpenId', makeRequest({ body: { BotName: 'Bot1', OpenIdUrl: seedUrl } }));
    const fromRoute = await call('get', '/Api/OpenId/:botName/:openIdUrl', makeRequest({
      method: 'GET',
      params: { botName: 'Bot1', openIdUrl: seedUrl },
    }));

    expect(fromRoute).toEqual(fromBody);
  });

  test('GET /Api/Health counts logged on bots', async () => {
    install();

    const route = findRoute('get', '/Api/Health');
    if (!route) throw new Error('health route missing');
    const { res, recorded } = makeResponse();
    await route.handler(makeRequest({ method: 'GET' }), res, jest.fn());

    expect(recorded.body).toEqual(expect.objectContaining({
      Success: true,
      Data: expect.objectContaining({ status: 'green', bots: { total: 1, loggedOn: 1 } }),
    }));
  });
});
