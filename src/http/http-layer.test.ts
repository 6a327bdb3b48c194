import { expect } from 'chai';
import sinon from 'sinon';
import { FetchHTTPLayer, createHTTPResponse } from './http-layer.js';
import { NetworkError } from '../errors.js';
import { expectRejection } from '../testUtils/testHelpers.js';

const TOKEN_URL = 'https://graph.facebook.com/oauth/access_token';

describe('createHTTPResponse', () => {
  it('decodes the body on demand', () => {
    const response = createHTTPResponse(200, '{"id":"1000001"}');

    expect(response.json()).to.deep.equal({ id: '1000001' });
  });

  it('throws SyntaxError for bodies that are not JSON', () => {
    const response = createHTTPResponse(200, 'access_token=abc');

    expect(() => response.json()).to.throw(SyntaxError);
  });
});

describe('FetchHTTPLayer', () => {
  let fetchStub: sinon.SinonStub<Parameters<typeof fetch>, ReturnType<typeof fetch>>;

  beforeEach(() => {
    fetchStub = sinon.stub(globalThis, 'fetch');
  });

  afterEach(() => {
    sinon.restore();
  });

  it('returns status, body and lower-cased headers for any status', async () => {
    fetchStub.resolves(
      new Response('{"error":"invalid_grant"}', {
        status: 400,
        headers: { 'Content-Type': 'application/json' },
      })
    );

    const response = await new FetchHTTPLayer().get(
      'https://api.github.com/user',
      { headers: { Accept: 'application/vnd.github+json' } }
    );

    expect(response.status).to.equal(400);
    expect(response.body).to.equal('{"error":"invalid_grant"}');
    expect(response.headers['content-type']).to.equal('application/json');
    expect(fetchStub.firstCall.args[1]?.method).to.equal('GET');
    expect(fetchStub.firstCall.args[1]?.headers).to.deep.equal({
      Accept: 'application/vnd.github+json',
    });
  });

  it('posts the form url-encoded', async () => {
    fetchStub.resolves(new Response('access_token=abc'));

    await new FetchHTTPLayer().post(
      TOKEN_URL,
      { code: 'test-code', redirect_uri: 'https://app.example.com/cb?x=1' },
      { headers: { Accept: 'application/json' } }
    );

    const init = fetchStub.firstCall.args[1];
    expect(init?.method).to.equal('POST');
    expect(init?.body).to.equal(
      'code=test-code&redirect_uri=https%3A%2F%2Fapp.example.com%2Fcb%3Fx%3D1'
    );
    expect(init?.headers).to.deep.equal({
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    });
    expect(init?.signal).to.be.instanceOf(AbortSignal);
  });

  it('reports transport failures without the query string', async () => {
    fetchStub.rejects(new TypeError('fetch failed'));

    const error = await expectRejection(
      new FetchHTTPLayer().get(
        'https://graph.facebook.com/me?access_token=test-access-token'
      ),
      NetworkError
    );

    expect(error.reason).to.equal('transport');
    expect(error.target).to.equal('https://graph.facebook.com/me');
    expect(error.message).to.equal(
      'Request to https://graph.facebook.com/me failed'
    );
    expect(error.cause).to.be.instanceOf(TypeError);
  });

  it('reports timeouts', async () => {
    fetchStub.rejects(
      Object.assign(new Error('The operation timed out'), {
        name: 'TimeoutError',
      })
    );

    const error = await expectRejection(
      new FetchHTTPLayer({ timeoutMs: 50 }).post(TOKEN_URL, {}),
      NetworkError
    );

    expect(error.reason).to.equal('timeout');
    expect(error.statusCode).to.equal(504);
  });

  it('reports cancellation by the caller', async () => {
    const controller = new AbortController();
    controller.abort();
    fetchStub.rejects(
      Object.assign(new Error('This operation was aborted'), {
        name: 'AbortError',
      })
    );

    const error = await expectRejection(
      new FetchHTTPLayer().post(TOKEN_URL, {}, { signal: controller.signal }),
      NetworkError
    );

    expect(error.reason).to.equal('aborted');
  });
});
