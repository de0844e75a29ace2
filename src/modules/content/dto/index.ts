export { ReadDto } from './read.dto';
export { SearchDto } from './search.dto';
