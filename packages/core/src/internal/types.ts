/**
 * Core type definitions
 */

// Transient owner: nodes tagged with the owner of an in-progress build may be
// filled in place by that build only
export type Owner = object | undefined;

export interface VLeaf<T> {
  kind: 'leaf';
  owner?: Owner;
  arr: T[];
}

export interface VBody<T> {
  kind: 'body';
  owner?: Owner;
  arr: VNode<T>[];
}

export type VNode<T> = VLeaf<T> | VBody<T>;

// Bit-trie persistent vector
export interface Vec<T> {
  readonly count: number;
  readonly shift: number;
  readonly root: VNode<T>;
  readonly tail: T[];
  readonly tailOwner?: Owner;
}
