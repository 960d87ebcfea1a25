export { cosineSimilarity } from './cosine.js';
