/**
 * Class string tokenization
 */

/** Ordered list of class tokens */
export type ClassList = readonly string[];

/** Every operation accepts a raw class string or an already split list */
export type ClassInput = string | ClassList;

/**
 * Split a class string on runs of whitespace. Lists pass through untouched.
 *
 * @example
 * tokenize('  bg-blue-500   text-white ') // => ['bg-blue-500', 'text-white']
 * tokenize('') // => []
 */
export function tokenize(input: ClassInput): ClassList {
  if (typeof input !== 'string') {
    return input;
  }
  return input.split(/\s+/).filter(token => token.length > 0);
}

export function join(list: ClassList): string {
  return list.filter(token => token.length > 0).join(' ');
}
