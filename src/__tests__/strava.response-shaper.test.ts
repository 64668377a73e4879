import { decodeBody, isSuccessStatus, shapeResponse } from '../modules/strava/response-shaper';

describe('shapeResponse', () => {
  it('passes plain string responses through untouched', () => {
    const gpx = '<gpx version="1.1"></gpx>';

    expect(shapeResponse(gpx)).toBe(gpx);
  });

  it('builds an envelope with the decoded body', () => {
    const envelope = shapeResponse({
      status: 201,
      headers: { 'x-ratelimit-usage': ['12,340'] },
      body: '{"id":1}'
    });

    expect(envelope).toEqual({
      headers: { 'x-ratelimit-usage': ['12,340'] },
      body: { id: 1 },
      success: true,
      status: 201
    });
  });

  it('produces identical envelopes for the same response', () => {
    const response = { status: 200, headers: {}, body: '[1,2,3]' };

    expect(shapeResponse(response)).toEqual(shapeResponse(response));
  });

  it.each([
    [200, true],
    [201, true],
    [202, false],
    [204, false],
    [401, false],
    [500, false]
  ])('flags status %i as success=%s', (status, expected) => {
    const envelope = shapeResponse({ status, headers: {}, body: '' });

    expect(typeof envelope === 'string' ? null : envelope.success).toBe(expected);
    expect(isSuccessStatus(status)).toBe(expected);
  });
});

describe('decodeBody', () => {
  it('returns null for empty bodies', () => {
    expect(decodeBody('')).toBeNull();
    expect(decodeBody('   ')).toBeNull();
  });

  it('returns null when the body is not JSON', () => {
    expect(decodeBody('<html>Too Many Requests</html>')).toBeNull();
  });

  it('decodes JSON scalars and documents', () => {
    expect(decodeBody('"ok"')).toBe('ok');
    expect(decodeBody('{"errors":[{"code":"invalid"}]}')).toEqual({ errors: [{ code: 'invalid' }] });
  });
});
