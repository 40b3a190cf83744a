import { Cart } from './Cart.js';

export class Customer {
  private readonly cart = new Cart();

  constructor(
    private name: string,
    private phoneNumber: number,
    private address: string
  ) {}

  getName(): string {
    return this.name;
  }

  setName(name: string): void {
    this.name = name;
  }

  getPhoneNumber(): number {
    return this.phoneNumber;
  }

  setPhoneNumber(phoneNumber: number): void {
    this.phoneNumber = phoneNumber;
  }

  getAddress(): string {
    return this.address;
  }

  setAddress(address: string): void {
    this.address = address;
  }

  getCart(): Cart {
    return this.cart;
  }

  // same record iff name and phone number match
  equals(other: Customer): boolean {
    return this.name === other.name && this.phoneNumber === other.phoneNumber;
  }

  toString(): string {
    return `Name: ${this.name} | Phone Number: ${this.phoneNumber} | Address: ${this.address}`;
  }
}
