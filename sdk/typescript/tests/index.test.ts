import { describe, expect, it } from 'vitest';

import * as sdk from '../src/index.js';

describe('package entry', () => {
  it('exposes the client and its helpers', () => {
    expect(new sdk.PortalClient({ server: 'http://portal.test/' }).server).toBe('http://portal.test');
    expect(sdk.DEFAULT_TIMEOUT).toBe(30000);
    expect(sdk.PROCESSED_ITEMS).toBe('1');
    expect(sdk.joinRecipients(['a', 'b'])).toBe('a,b');
    expect(sdk.encodeTaskParameters({ x: [1] })).toBe('{"x":[1]}');
  });

  it('exposes the known enumeration values', () => {
    expect(Object.values(sdk.AlertType)).toEqual(['INFO', 'WARN', 'ERROR']);
    expect(Object.values(sdk.MessageType)).toEqual(['TEXT', 'HTML']);
    expect(Object.values(sdk.AutomationTaskFinishStatus)).toEqual([
      'SUCCESS',
      'PARTIALLY_COMPLETED',
      'FAILED',
    ]);
  });

  it('exposes the error hierarchy', () => {
    expect(new sdk.RequestError('alert', 400, 'bad thing', '')).toBeInstanceOf(sdk.PortalError);
  });
});
