import { Customer } from '../../domain/entities/Customer.js';

export interface IAddressBook {
  addCustomer(customer: Customer): void;
  getAllRecords(): Customer[];
  containsCustomer(customer: Customer): boolean;
  getCustomer(name: string, phoneNumber: number): Customer;
}
