// istanbul ignore next
export function noMatch(value: never): never {
  throw new Error(`no match for ${JSON.stringify(value)}`);
}
