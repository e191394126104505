import { componentCount } from '../view/element-kind';
import type { TypedView } from '../view/typed-view';

/** Component-wise range of a view. */
export interface Bounds {
  readonly min: number[];
  readonly max: number[];
}

/**
 * Component-wise min/max over every element. Plain `<` / `>` comparisons:
 * a NaN never replaces a value, but a leading NaN stays. Undefined for an
 * empty view.
 */
export function computeBounds(view: TypedView): Bounds | undefined {
  if (view.count === 0) return undefined;
  const components = componentCount(view.kind);
  const min = view.element(0);
  const max = [...min];
  for (let i = 1; i < view.count; i++) {
    for (let c = 0; c < components; c++) {
      const v = view.component(i, c);
      if (v < min[c]) min[c] = v;
      if (v > max[c]) max[c] = v;
    }
  }
  return { min, max };
}
