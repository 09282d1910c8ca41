export {
  ascending,
  descending,
  naturalOrder,
  compareBy,
  thenBy,
  type Comparator,
} from './comparators'
export { mergeSort, builtinSort, isSorted } from './sort'
export {
  binarySearch,
  linearSearch,
  builtinSearch,
  NOT_FOUND,
} from './search'
