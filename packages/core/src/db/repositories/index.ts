/**
 * Repository Index
 */

export { UserRepository } from './userRepository.js';
export { ContactRepository } from './contactRepository.js';
