/** A rectangle in canvas units; origin keeps its precision, size is whole */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** An integer-pixel crop region in the source raster */
export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** A graphic node confirmed to carry a name */
export interface NamedShape {
  name: string;
  bounds?: string;
  /** Node ID, for diagnostics only */
  id?: number | string;
}

/** Everything needed to produce one slice */
export interface CropPlan {
  name: string;
  bounds: Rect;
  crop: PixelRect;
  outputPath: string;
}

/** Arguments of one crop tool invocation */
export interface CropRequest {
  source: string;
  region: PixelRect;
  destination: string;
}
