// nodes/WeChatXml/core/fields/index.ts

// Factory shared by every kind
export * from './field';

// String, numbers, DateTime, Base64
export * from './scalar';

// Image, Voice, Video, Music, TaskCard, Hardware
export * from './media';

// News articles
export * from './articles';
