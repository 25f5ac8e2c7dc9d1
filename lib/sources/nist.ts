import { SourceDefinition, SourceFields } from './fetchSource';
import { sourceUrl } from '../registry';
import { SourceError, toSourceError } from '../errors';
import logger from '../logger';

const NAME = 'nist_usgv6';
const TIMEOUT_MS = 25000;

export const NIST_ENDPOINTS = ['/cgi-bin/generate-gov', '/cgi-bin/generate-edu', '/cgi-bin/generate-all.www', '/'];

/**
 * USGv6 deployment monitor. Report endpoints are tried in order and the first
 * one answering 2xx is reported as the record's url.
 */
export const nistUsgv6Source: SourceDefinition = {
  name: NAME,
  async load({ http }): Promise<SourceFields> {
    const base = sourceUrl(NAME).replace(/\/$/, '');
    let lastError: SourceError = new SourceError('no endpoints tried', NAME);
    for (const path of NIST_ENDPOINTS) {
      const url = `${base}${path}`;
      try {
        await http.getText(url, { timeoutMs: TIMEOUT_MS });
        return { url, data_type: 'Live USGv6 deployment monitor' };
      } catch (e) {
        lastError = toSourceError(e, NAME);
        logger.debug({ err: lastError, url }, 'NIST endpoint failed');
      }
    }
    throw lastError;
  },
};

export default nistUsgv6Source;
