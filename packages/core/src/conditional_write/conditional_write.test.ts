import { conditionalWrite, probeMarker, ConditionalWriteConflict } from './conditional_write';
import type { RemoteClient, RemoteResponse } from '../remote_client';

function scriptedClient(...responses: RemoteResponse[]): RemoteClient & { call: jest.Mock } {
  const call = jest.fn();
  for (const response of responses) {
    call.mockResolvedValueOnce(response);
  }
  return { call };
}

describe('conditionalWrite', () => {
  const buildBody = (marker: string | undefined) => (marker ? { value: 'v', sha: marker } : { value: 'v' });

  it('should omit the marker when the probe finds nothing', async () => {
    const client = scriptedClient({ status: 404, data: null }, { status: 201, data: {} });

    const result = await conditionalWrite({ client, resourcePath: '/things/a', buildBody });

    expect(client.call).toHaveBeenNthCalledWith(1, 'GET', '/things/a');
    expect(client.call).toHaveBeenNthCalledWith(2, 'PUT', '/things/a', { value: 'v' });
    expect(result).toEqual({ status: 201, data: {}, success: true, marker: undefined });
  });

  it('should send the exact marker returned by the probe', async () => {
    const client = scriptedClient({ status: 200, data: { sha: 'abc123' } }, { status: 200, data: {} });

    const result = await conditionalWrite({ client, resourcePath: '/things/a', buildBody });

    expect(client.call).toHaveBeenNthCalledWith(2, 'PUT', '/things/a', { value: 'v', sha: 'abc123' });
    expect(result.marker).toBe('abc123');
  });

  it('should read the marker from a custom field', async () => {
    const client = scriptedClient({ status: 200, data: { etag: 'e-1' } });

    const marker = await probeMarker({ client, resourcePath: '/things/a', markerField: 'etag' });

    expect(marker).toBe('e-1');
  });

  it('should treat a failed probe as no marker', async () => {
    const client = scriptedClient({ status: 500, data: { sha: 'ignored' } });

    await expect(probeMarker({ client, resourcePath: '/things/a' })).resolves.toBeUndefined();
  });

  it('should throw ConditionalWriteConflict on a conflict status', async () => {
    const client = scriptedClient({ status: 200, data: { sha: 'stale' } }, { status: 409, data: { message: 'conflict' } });

    const error = await conditionalWrite({ client, resourcePath: '/things/a', buildBody }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConditionalWriteConflict);
    expect(error).toMatchObject({ resourcePath: '/things/a', marker: 'stale', status: 409 });
  });

  it('should report other statuses as unsuccessful without throwing', async () => {
    const client = scriptedClient({ status: 404, data: null }, { status: 500, data: 'oops' });

    const result = await conditionalWrite({ client, resourcePath: '/things/a', buildBody });

    expect(result).toEqual({ status: 500, data: 'oops', success: false, marker: undefined });
  });

  it('should honour custom success and conflict statuses', async () => {
    const client = scriptedClient({ status: 404, data: null }, { status: 412, data: null });

    await expect(conditionalWrite({
      client,
      resourcePath: '/things/a',
      buildBody,
      successStatuses: [204],
      conflictStatuses: [412],
    })).rejects.toBeInstanceOf(ConditionalWriteConflict);
  });
});
