export { UserRepository } from './userRepository.js';
export { AdItemRepository } from './adItemRepository.js';
export { UserActionRepository } from './userActionRepository.js';
