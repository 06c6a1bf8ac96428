export {
  cellValueSchema,
  jsonCellValueSchema,
  cellRangeSchema,
  cellRefSchema,
  type CellValueInput,
  type JsonCellValueInput,
  type CellRangeInput,
} from './cell-schema';

export {
  datasetSchema,
  datasetInputSchema,
  type DatasetSchemaInput,
  type DatasetInput,
} from './dataset-schema';

export {
  chartRequestSchema,
  reportConfigSchema,
  derivedSheetSchema,
  reportDefinitionSchema,
  type ChartRequestInput,
  type ReportConfigInput,
  type DerivedSheetInput,
  type ReportDefinitionInput,
} from './report-schema';
