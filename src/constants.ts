/** Extension of every slice written to the output directory */
export const SLICE_EXT = ".png";

/** Scale factor used when none is given */
export const DEFAULT_SCALE = 1;

/** ImageMagick 7 entry point; ImageMagick 6 installs only `convert` */
export const DEFAULT_MAGICK_BINARY = "magick";

/** Environment variable overriding the ImageMagick binary */
export const MAGICK_PATH_ENV = "SLICER_MAGICK_PATH";

/** Child collections expanded on every graphic node */
export const NODE_CHILD_KEYS = ["Graphics", "GraphicsList"] as const;
