import { AuditedCrudService } from '../../../shared/application/audited-crud.service';
import { Branch, BranchFilter, BranchInput } from '../domain/branch.entity';

export class BranchService extends AuditedCrudService<Branch, BranchInput, BranchInput, BranchFilter> {
  protected readonly entity = 'branch';
  protected readonly label = 'Branch';

  protected async prepare(input: BranchInput): Promise<BranchInput> {
    return input;
  }
}
