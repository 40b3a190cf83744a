import { Customer } from '../../domain/entities/Customer.js';
import { IAddressBook } from './IAddressBook.js';
import { DuplicateEntityError, EntityNotFoundError } from '../../domain/errors/index.js';

// customer records held in memory for the life of the process
export class InMemoryAddressBook implements IAddressBook {
  private customers: Customer[] = [];

  addCustomer(customer: Customer): void {
    if (this.containsCustomer(customer)) {
      throw new DuplicateEntityError('Customer', customer.toString());
    }
    this.customers.push(customer);
  }

  getAllRecords(): Customer[] {
    return [...this.customers];
  }

  containsCustomer(customer: Customer): boolean {
    return this.customers.some(c => c.equals(customer));
  }

  getCustomer(name: string, phoneNumber: number): Customer {
    const found = this.customers.find(
      c => c.getName() === name && c.getPhoneNumber() === phoneNumber
    );
    if (!found) throw new EntityNotFoundError('Customer', `${name} (${phoneNumber})`);
    return found;
  }

  // Utility methods for testing
  getCustomerCount(): number {
    return this.customers.length;
  }

  clearAllCustomers(): void {
    this.customers = [];
  }
}
