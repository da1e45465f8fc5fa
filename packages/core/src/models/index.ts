export type { ApiMessage } from "./api-message.model";
export type { Inventory, Order, OrderStatus } from "./order.model";
export { formatShipDate } from "./order.model";
export type { Category, Pet, PetStatus, Tag } from "./pet.model";
export type { User } from "./user.model";
