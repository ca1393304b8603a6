export { Either, Left, Right, left, right, tryCatchAsync } from './either';
