import { decodeHtmlEntities, findLoginForm, parseAttributes } from '../../lib/steamLogin/loginForm';

const OPENID_PAGE = `
<html><body>
  <form action="/search" method="get"><input type="hidden" name="q" value="ignored"></form>
  <form id="openidForm" action="https://steamcommunity.com/openid/login" method="post">
    <input type="hidden" name="action" value="steam_openid_login">
    <input type="hidden" name="openid.mode" value="checkid_setup" />
    <input type='hidden' name='openidparams' value='a&amp;b=c'>
    <input type="hidden" name="nonce" value="test-nonce">
    <input type="submit" name="submit" value="Sign In">
  </form>
</body></html>`;

describe('loginForm', () => {
  test('decodeHtmlEntities handles named and numeric entities', () => {
    expect(decodeHtmlEntities('a&amp;b &lt;c&gt; &#39;d&#39; &#x41; &nbsp;')).toBe('a&b <c> \'d\' A &nbsp;');
  });

  test('decodeHtmlEntities leaves out-of-range code points as written', () => {
    expect(decodeHtmlEntities('a&#99999999;b &#x110000; &#x10FFFF;')).toBe('a&#99999999;b &#x110000; \u{10FFFF}');
  });

  test('parseAttributes reads quoted and bare values', () => {
    expect(parseAttributes(' id="openidForm" method=post data-x=\'1\'')).toEqual({
      id: 'openidForm',
      method: 'post',
      'data-x': '1',
    });
  });

  test('findLoginForm collects hidden inputs of the matching form', () => {
    const form = findLoginForm(OPENID_PAGE, 'https://steamcommunity.com/openid/login?x=1', (attrs) => attrs.id === 'openidForm');

    expect(form).toEqual({
      action: 'https://steamcommunity.com/openid/login',
      fields: {
        action: 'steam_openid_login',
        'openid.mode': 'checkid_setup',
        openidparams: 'a&b=c',
        nonce: 'test-nonce',
      },
    });
  });

  test('relative actions resolve against the page url', () => {
    const form = findLoginForm(OPENID_PAGE, 'https://steamcommunity.com/openid/login', (attrs) => attrs.method === 'get');

    expect(form).toEqual({ action: 'https://steamcommunity.com/search', fields: { q: 'ignored' } });
  });

  test('returns null when no form matches', () => {
    expect(findLoginForm(OPENID_PAGE, 'https://steamcommunity.com/', (attrs) => attrs.id === 'missing')).toBeNull();
  });
});
