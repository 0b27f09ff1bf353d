import type { RoverAction } from '../engine/rover';

export interface UnsupportedActionError {
  kind: 'UnsupportedAction';
  character: string;
  index: number;
}

export type DecodeError = UnsupportedActionError;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

export const decodeAction = (character: string, index = 0): DecodeResult<RoverAction> => {
  switch (character) {
    case 'F':
      return { ok: true, value: 'F' };
    case 'L':
      return { ok: true, value: 'L' };
    case 'R':
      return { ok: true, value: 'R' };
    default:
      return { ok: false, error: { kind: 'UnsupportedAction', character, index } };
  }
};

/**
 * Decodes a command string such as `"FFLRF"`. Stops at the first character
 * that is not a known action; nothing after it is decoded.
 */
export const decodeCommands = (text: string): DecodeResult<RoverAction[]> => {
  const actions: RoverAction[] = [];
  const characters = Array.from(text);

  for (let index = 0; index < characters.length; index += 1) {
    const decoded = decodeAction(characters[index], index);
    if (!decoded.ok) {
      return decoded;
    }
    actions.push(decoded.value);
  }

  return { ok: true, value: actions };
};

export const describeDecodeError = (error: DecodeError): string =>
  `unsupported action '${error.character}' at index ${error.index}`;
