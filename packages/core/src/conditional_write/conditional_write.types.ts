import type { RemoteClient } from '../remote_client';

/**
 * Options for a probe-then-write against a single resource path.
 */
export type ConditionalWriteOptions<TBody> = {
  client: RemoteClient;
  /** Resource read for its marker and then written */
  resourcePath: string;
  /** Builds the write body; receives the marker only when the probe found one */
  buildBody: (marker: string | undefined) => TBody;
  /** Field of the probe response holding the marker (default: 'sha') */
  markerField?: string;
  /** Statuses that mean the write succeeded (default: [200, 201]) */
  successStatuses?: readonly number[];
  /** Statuses that mean the marker no longer matches (default: [409]) */
  conflictStatuses?: readonly number[];
};

export type ConditionalWriteResult = {
  /** Status of the write */
  status: number;
  /** Body of the write response */
  data: unknown;
  success: boolean;
  /** Marker discovered by the probe and sent with the write */
  marker: string | undefined;
};
