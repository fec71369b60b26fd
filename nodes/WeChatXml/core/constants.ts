// Time zone the platform stamps CreateTime in
export const DEFAULT_TIME_ZONE = 'Asia/Shanghai';

export const ENVELOPE_ROOT = 'xml';

// Discriminator elements
export const MESSAGE_TYPE_TAG = 'MsgType';
export const COMPONENT_TYPE_TAG = 'InfoType';
export const EVENT_TYPE_TAG = 'Event';

export const MAX_ARTICLES = 10;

export const HARDWARE_DEFAULTS = {
    view: 'myrank',
    action: 'ranklist',
} as const;

// Elements the parser must always read as lists
export const ARRAY_ELEMENT_PATHS = new Set<string>([
    'xml.Articles.item',
]);
