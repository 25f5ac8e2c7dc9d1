import { TimeoutError } from '../errors';

/**
 * Shared timeout helper for promises. The wrapped promise is not cancelled;
 * it keeps running and its late result is ignored by this caller.
 */
export function withTimeout<T>(p: Promise<T>, ms: number, label = 'operation'): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
    p.then(
      (v) => { clearTimeout(t); resolve(v); },
      (e) => { clearTimeout(t); reject(e); },
    );
  });
}
