import type { IpVersion } from '../domain/measurement/ip-source.js';

export interface IpListSource {
  /** Path of a non-empty candidate IP file for `version`. */
  ensure(version: IpVersion): Promise<string>;
}
