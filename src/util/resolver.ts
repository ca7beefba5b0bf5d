import { errorMessage } from '../errors';

/**
 * A capability-checked candidate. `location` names what is being checked so a
 * failed resolution can tell the user everywhere that was searched.
 */
export interface Candidate<T> {
  location: string;
  resolve: () => Promise<T | null>;
}

export interface Resolution<T> {
  value: T | null;
  tried: string[];
}

/**
 * Try each candidate in order until one yields a usable value.
 * Candidates that throw count as misses, with the error noted beside the location.
 */
export const resolveFirst = async <T>(candidates: Candidate<T>[]): Promise<Resolution<T>> => {
  const tried: string[] = [];
  for (const candidate of candidates) {
    tried.push(candidate.location);
    try {
      const value = await candidate.resolve();
      if (value !== null) return { value, tried };
    } catch (err) {
      tried[tried.length - 1] = `${candidate.location} (${errorMessage(err)})`;
    }
  }
  return { value: null, tried };
};
