export { floorDiv, floorMod, toKnutCount } from './integer-math.js';
export {
  totalKnuts,
  distributeAsKnuts,
  distributeAsSickles,
  distributeAsGalleons,
} from './conversions.js';
