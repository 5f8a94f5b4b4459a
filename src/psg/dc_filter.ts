export const DC_FILTER_SIZE = 1024;

export interface IDcFilter {
  render: (left: number, right: number) => [number, number];
  reset: () => void;
}

/** Subtracts a moving average of the last `size` frames from both channels. */
export const createDcFilter = (size: number = DC_FILTER_SIZE): IDcFilter => {
  if (size <= 0 || (size & (size - 1)) !== 0) throw new Error('DC filter size must be a power of two');
  const mask = size - 1;
  const scale = 1 / size;
  const leftDelay = new Float64Array(size);
  const rightDelay = new Float64Array(size);
  let leftSum = 0;
  let rightSum = 0;
  let index = 0;

  const render = (left: number, right: number): [number, number] => {
    leftSum += -leftDelay[index]! + left;
    rightSum += -rightDelay[index]! + right;
    leftDelay[index] = left;
    rightDelay[index] = right;
    index = (index + 1) & mask;
    return [left - leftSum * scale, right - rightSum * scale];
  };

  const reset = (): void => {
    leftDelay.fill(0);
    rightDelay.fill(0);
    leftSum = 0;
    rightSum = 0;
    index = 0;
  };

  return { render, reset };
};
