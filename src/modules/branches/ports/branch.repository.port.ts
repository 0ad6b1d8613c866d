import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import { Branch, BranchFilter, BranchInput } from '../domain/branch.entity';

export type BranchRepositoryPort = CrudRepositoryPort<Branch, BranchInput, BranchFilter>;
