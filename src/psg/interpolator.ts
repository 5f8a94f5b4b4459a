export interface IInterpolator {
  feed: (value: number) => void;
  interpolate: (x: number) => number;
  reset: () => void;
}

/**
 * 4-point, 2nd-order parabolic interpolator. Coefficients are cached on every feed so any number of
 * points between the two middle samples can be taken from the same history.
 */
export const createInterpolator = (): IInterpolator => {
  let y0 = 0;
  let y1 = 0;
  let y2 = 0;
  let y3 = 0;
  let c0 = 0;
  let c1 = 0;
  let c2 = 0;

  const feed = (value: number): void => {
    y0 = y1;
    y1 = y2;
    y2 = y3;
    y3 = value;
    const d = y2 - y0;
    c0 = 0.5 * y1 + 0.25 * (y0 + y2);
    c1 = 0.5 * d;
    c2 = 0.25 * (y3 - y1 - d);
  };

  // x in [0, 1)
  const interpolate = (x: number): number => (c2 * x + c1) * x + c0;

  const reset = (): void => {
    y0 = y1 = y2 = y3 = 0;
    c0 = c1 = c2 = 0;
  };

  return { feed, interpolate, reset };
};
