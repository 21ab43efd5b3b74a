import type { ArgsParserOptions } from './interfaces';

export const DEFAULT_ARGS_PARSER_OPTIONS: Readonly<Required<ArgsParserOptions>> = {
  parameterLimit: 1000,
  plusAsSpace: true,
};
