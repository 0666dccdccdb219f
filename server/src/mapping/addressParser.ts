import { ParseError, UnknownParameterError } from '../errors';

/**
 * A parsed control address. `scene: null` means the active scene
 * (legacy `/effect/...` addresses).
 */
export type CommandTarget =
  | { kind: 'segment'; scene: string | null; effect: string; segment: string; param: string }
  | { kind: 'effect'; scene: string; effect: string; param: string }
  | { kind: 'scene'; scene: string; param: string }
  | { kind: 'manager'; param: string }
  | { kind: 'palette'; name: string }
  | { kind: 'request'; param: string };

/**
 * Split an OSC address into its target ids and parameter name.
 *
 * Recognized shapes:
 * - /scene/{s}/effect/{e}/segment/{g}/{param}
 * - /scene/{s}/effect/{e}/{param}
 * - /scene/{s}/{param}
 * - /scene_manager/{param}
 * - /effect/{e}/segment/{g}/{param} and /effect/{e}/object/{g}/{param}
 * - /palette/{name}
 * - /request/{param}
 */
export function parseAddress(address: string): CommandTarget {
  if (!address.startsWith('/')) {
    throw new ParseError(`Address must start with "/": ${address}`, { address });
  }
  const parts = address.slice(1).split('/');
  if (parts.some((part) => part.length === 0)) {
    throw new ParseError(`Address has an empty component: ${address}`, { address });
  }

  const [root, ...rest] = parts;
  switch (root) {
    case 'scene':
      if (rest.length === 6 && rest[1] === 'effect' && rest[3] === 'segment') {
        return { kind: 'segment', scene: rest[0], effect: rest[2], segment: rest[4], param: rest[5] };
      }
      if (rest.length === 4 && rest[1] === 'effect') {
        return { kind: 'effect', scene: rest[0], effect: rest[2], param: rest[3] };
      }
      if (rest.length === 2) {
        return { kind: 'scene', scene: rest[0], param: rest[1] };
      }
      break;
    case 'scene_manager':
      if (rest.length === 1) {
        return { kind: 'manager', param: rest[0] };
      }
      break;
    case 'effect':
      if (rest.length === 4 && (rest[1] === 'segment' || rest[1] === 'object')) {
        return { kind: 'segment', scene: null, effect: rest[0], segment: rest[2], param: rest[3] };
      }
      break;
    case 'palette':
      if (rest.length === 1) {
        return { kind: 'palette', name: rest[0] };
      }
      break;
    case 'request':
      if (rest.length === 1) {
        return { kind: 'request', param: rest[0] };
      }
      break;
  }
  throw new UnknownParameterError('address', address);
}
