export { Repository, STORE_FOLDER, THUMBNAIL_FOLDER } from './repository.js';
