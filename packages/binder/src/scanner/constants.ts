export const IGNORE_TAG = '-';

export const TAG_MODIFIER_SEPARATOR = ',';
