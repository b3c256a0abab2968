export {
  Cart,
  CartRegistry,
  type CartLine,
  type CartDependencies,
  type AddItemError,
  type SetQuantityError,
} from './cart.js';
