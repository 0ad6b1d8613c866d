import { AuditedCrudService } from '../../../shared/application/audited-crud.service';
import { ValidationError } from '../../../shared/errors/validation.error';
import { Shift, ShiftFilter, ShiftInput } from '../domain/shift.entity';

export class ShiftService extends AuditedCrudService<Shift, ShiftInput, ShiftInput, ShiftFilter> {
  protected readonly entity = 'shift';
  protected readonly label = 'Shift';

  protected async prepare(input: ShiftInput): Promise<ShiftInput> {
    if (input.startTime && input.endTime && input.startTime.slice(0, 5) === input.endTime.slice(0, 5)) {
      throw new ValidationError('Shift start and end time must differ', { endTime: 'Same as start time' });
    }
    return input;
  }
}
