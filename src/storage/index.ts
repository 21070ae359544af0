// Storage module barrel export

export {
  FaceIndex,
  DimensionMismatchError,
  IndexFileError,
  INDEX_FORMAT_VERSION,
  cosineDistance,
  euclideanDistance,
  similarityFromDistance,
} from "./face-index";
