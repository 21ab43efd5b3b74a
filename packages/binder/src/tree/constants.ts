import type { TreeBuilderOptions } from './interfaces';

export const DEFAULT_TREE_BUILDER_OPTIONS: Readonly<Required<TreeBuilderOptions>> = {
  strictMode: true,
  depth: 20,
};
