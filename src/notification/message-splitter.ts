export const DEFAULT_MAX_MESSAGE_LENGTH = 4000;

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/**
 * Splits text into chunks of at most `maxLength` characters. Each cut is made
 * at the last newline within the limit, or hard at the limit when there is
 * none. Leading whitespace of every continuation chunk is dropped.
 */
export function splitMessage(
  message: string,
  maxLength: number = DEFAULT_MAX_MESSAGE_LENGTH
): string[] {
  if (!Number.isInteger(maxLength) || maxLength <= 0) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }
  if (message.length <= maxLength) return [message];

  const parts: string[] = [];
  let rest = message;

  while (rest.length > 0) {
    if (rest.length <= maxLength) {
      parts.push(rest);
      break;
    }

    let splitPoint = rest.lastIndexOf("\n", maxLength - 1);
    // A newline at 0 would yield an empty chunk and no progress
    if (splitPoint <= 0) {
      splitPoint = maxLength;
      // Keep surrogate pairs together
      if (maxLength > 1 && isHighSurrogate(rest.charCodeAt(maxLength - 1))) {
        splitPoint = maxLength - 1;
      }
    }

    parts.push(rest.slice(0, splitPoint));
    rest = rest.slice(splitPoint).trimStart();
  }

  return parts;
}
