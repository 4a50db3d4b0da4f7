export { ChecksumEngine, CHUNK_SIZE, DEFAULT_ALGORITHM, isSupportedAlgorithm } from './ChecksumEngine'
