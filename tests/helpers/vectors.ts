/**
 * Signatures computed independently for the secret "test-secret".
 */
export const TEST_SECRET = 'test-secret';

export const SIGNED_REQUESTS = {
  getRoot: {
    method: 'GET',
    path: '/',
    body: '',
    signature: '8f7b53f689cf927e99c1bf3a0d6e8fbc08fb742ff47bed730df23e3d0681217b',
  },
  getHello: {
    method: 'GET',
    path: '/hello',
    body: '',
    signature: 'a0aa97bf9f79fbbbc318fb5fbc3dcfc44155ec080b1fdc44bea31414720cba29',
  },
  postOrder: {
    method: 'POST',
    path: '/orders',
    body: '{"id":1}',
    signature: '3a9d8e79746c6a0d94df56d0c20052a009e204a4f5dfae6bcf4f688278495b0f',
  },
  postOrderEmpty: {
    method: 'POST',
    path: '/orders',
    body: '',
    signature: '88326ebfdb1a2573e7534a8e44c0bae5b3186ae26d452cbe2fe86911ff690e9b',
  },
  getOrders: {
    method: 'GET',
    path: '/orders',
    body: '',
    signature: '846e6142561d2fcd085ae3404737786c24eb3befea3f916a0ba7275085d0d384',
  },
  putOrder: {
    method: 'PUT',
    path: '/orders/7',
    body: '{"qty":2}',
    signature: '68b7978eaffd325a16d2672e58c31ffddb1a1606baa3fe1befc517a0d5e3cc25',
  },
  getSearch: {
    method: 'GET',
    path: '/search',
    body: '',
    signature: '21d2038a2672c5ffc6ae7f8acca3c526258a13b526bcf4c31cdb02d8b0349930',
  },
} as const;

/** GET / signed with "other-secret". */
export const GET_ROOT_OTHER_SECRET = 'a97a37967fa73c1c414072b1fe2416e43cb3ac5dd891fabb4cad7a14175626f3';

export const SIGNED_RESPONSES = {
  hello: { body: 'Hello, world!', signature: '7ef9abb6344f627745dc6e5a0213f3c7405c2ebadec4eb157767de3995da9271' },
  empty: { body: '', signature: 'a41bc6d81d6413576ae0994995e0ad89a416ec97389515c3604f47722122eeeb' },
  json: { body: '{"ok":true}', signature: '97b4f11584439784b801821ece72af4e29c19573aacf94bcc0533c09086b3643' },
} as const;
