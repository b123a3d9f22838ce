export { sha256, hashObject, digestsMatch } from './hasher.js';
