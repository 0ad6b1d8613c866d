// src/shared/types/database.types.ts
// Raw row shapes as returned by the driver. NUMERIC and DATE columns are
// typed loosely because drivers differ in how they materialize them.

type Numeric = number | string;
type DateValue = string | Date;

export type DbBranchRow = {
  id: number;
  name: string;
  address: string | null;
  contact: string | null;
};

export type DbEmployeeRow = {
  id: number;
  name: string;
  contact: string;
  branch_id: number | null;
  role: string;
};

export type DbFarmerRow = {
  id: number;
  name: string;
  code: string;
  contact: string;
  bank_id: number | null;
  branch_id: number | null;
};

export type DbCustomerRow = {
  id: number;
  name: string;
  contact: string;
  branch_id: number | null;
};

export type DbShiftRow = {
  id: number;
  name: string;
  start_time: string | null;
  end_time: string | null;
};

export type DbMilkCollectionRow = {
  id: number;
  farmer_id: number | null;
  shift_id: number | null;
  date: DateValue;
  qty_ltr: Numeric;
  fat_pct: Numeric;
  price_per_ltr: Numeric;
  due_amt: Numeric;
  notes: string | null;
  created_by: number | null;
};

export type DbSaleRow = {
  id: number;
  customer_id: number | null;
  shift_id: number | null;
  date: DateValue;
  qty_ltr: Numeric;
  unit_price: Numeric;
  discount: Numeric | null;
  paid_amt: Numeric;
  due_amt: Numeric;
  created_by: number | null;
};

export type DbPaymentRow = {
  id: number;
  party_id: number;
  date: DateValue;
  amount: Numeric;
  mode: string;
  reference: string | null;
  notes: string | null;
  created_by: number | null;
  created_at: DateValue;
};

export type DbAuditLogRow = {
  id: number;
  entity: string;
  entity_id: number;
  action: string;
  actor: string;
  details: unknown;
  created_at: DateValue;
};

export type DbSummaryRow = {
  count: Numeric;
  litres: Numeric;
  amount: Numeric;
};

export type DbTotalRow = {
  total: Numeric | null;
};
