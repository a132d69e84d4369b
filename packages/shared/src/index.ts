export * from './constants/vocabulary.js';
export * from './types/delivery.js';
export type * from './types/collaborators.js';
export * from './stores/PendingTranscriptStore.js';
export * from './stores/RedisPendingTranscriptStore.js';
export * from './clients/TwilioClient.js';
export * from './clients/SpeechToTextClient.js';
export * from './clients/DeliverySheetClient.js';
export * from './clients/RedisClient.js';
