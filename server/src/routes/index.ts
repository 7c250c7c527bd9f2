export { createChatRouter } from './chat';
export { createWelcomeRouter } from './welcome';
export { createAudioRouter } from './audio';
export { createHealthRouter } from './health';
