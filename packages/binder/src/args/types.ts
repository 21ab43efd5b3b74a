export type ArgumentPairs = Iterable<readonly [string, string]>;

export type ArgumentRecord = Readonly<Record<string, string | readonly string[]>>;

export type ArgumentsInit = ArgumentPairs | ArgumentRecord;
