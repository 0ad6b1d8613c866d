import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import { Customer, CustomerFilter, CustomerInput } from '../domain/customer.entity';

export type CustomerRepositoryPort = CrudRepositoryPort<Customer, CustomerInput, CustomerFilter>;
