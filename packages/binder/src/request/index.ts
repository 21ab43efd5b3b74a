export * from './decode-request';
export * from './enums';
export * from './xml-body';
export * from './interfaces';
