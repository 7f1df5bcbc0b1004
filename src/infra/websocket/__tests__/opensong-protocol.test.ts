import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseNotification } from '../opensong-protocol.js';
import { statusXml } from '../../../../tests/helpers/opensong-fixtures.js';

describe('parseNotification', () => {
  it('reads the running flag and live slide from a status frame', () => {
    assert.deepStrictEqual(parseNotification(statusXml(42)), { kind: 'status', running: true, slideId: '42' });
  });

  it('reports a stopped presentation', () => {
    assert.deepStrictEqual(parseNotification(statusXml(3, false)), { kind: 'status', running: false, slideId: '3' });
  });

  it('omits the slide id for item number 0', () => {
    assert.deepStrictEqual(parseNotification(statusXml(0)), { kind: 'status', running: true });
  });

  it('omits the slide id when the status has no slide', () => {
    const raw = '<response resource="presentation" action="status"><presentation running="1"><screen mode="B"/></presentation></response>';
    assert.deepStrictEqual(parseNotification(raw), { kind: 'status', running: true });
  });

  it('recognises the subscription acknowledgements', () => {
    assert.deepStrictEqual(parseNotification('OK'), { kind: 'ack' });
    assert.deepStrictEqual(parseNotification('The requested action is not available.'), { kind: 'already_subscribed' });
  });

  it('passes anything else through as unknown', () => {
    assert.deepStrictEqual(parseNotification('hello'), { kind: 'unknown', raw: 'hello' });
    assert.deepStrictEqual(parseNotification('<broken'), { kind: 'unknown', raw: '<broken' });
  });
});
