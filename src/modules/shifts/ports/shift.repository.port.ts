import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import { Shift, ShiftFilter, ShiftInput } from '../domain/shift.entity';

export type ShiftRepositoryPort = CrudRepositoryPort<Shift, ShiftInput, ShiftFilter>;
