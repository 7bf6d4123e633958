import { NotFoundError, isNotFoundError, type ResourceDescriptor } from '../types';
import type { Logger } from '../logging';
import type { ListingSource, LocateOptions } from './types';

/** Name that selects the first available resource. */
export const ANY_RESOURCE = '*';

export interface LocatorOptions extends LocateOptions {
  logger?: Logger;
}

async function materialize(listing: ListingSource): Promise<ResourceDescriptor[]> {
  return typeof listing === 'function' ? listing() : listing;
}

/**
 * Resolve `desiredName` against a listing. Names are compared without regard
 * to case and the first match wins; `*` selects the first entry.
 *
 * @throws NotFoundError when the listing is empty, or nothing matches and
 *   `fallbackToFirst` is off
 */
export async function locateResource(
  listing: ListingSource,
  desiredName: string,
  options: LocatorOptions
): Promise<ResourceDescriptor> {
  const { kind, logger, fallbackToFirst = false, matches } = options;
  const candidates = (await materialize(listing)).filter(candidate => (matches ? matches(candidate) : true));

  const [first] = candidates;
  if (first === undefined) {
    throw new NotFoundError(`No ${kind} available`, { kind, name: desiredName });
  }
  if (desiredName === ANY_RESOURCE) {
    logger?.debug(`Using first ${kind} ${first.name} for ${ANY_RESOURCE}`);
    return first;
  }

  const wanted = desiredName.toLowerCase();
  const match = candidates.find(candidate => candidate.name.toLowerCase() === wanted);
  if (match !== undefined) {
    return match;
  }
  if (fallbackToFirst) {
    logger?.warn(`No ${kind} named ${desiredName}, falling back to ${first.name}`);
    return first;
  }
  throw new NotFoundError(`No ${kind} named ${desiredName}`, { kind, name: desiredName });
}

/** Like {@link locateResource}, but absence yields null. */
export async function findResource(
  listing: ListingSource,
  desiredName: string,
  options: LocatorOptions
): Promise<ResourceDescriptor | null> {
  try {
    return await locateResource(listing, desiredName, options);
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
}
