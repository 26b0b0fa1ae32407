export { assertStatus } from './status.js';
export type {
    RecordSetStatus,
    RawRecord,
    RequiredColumn,
    ColumnMap,
    TabularData,
    TabularSource,
    RawRecordSet,
    CleanedRecordSet,
    CategorizedRecordSet,
    RecordSet,
} from './types.js';
