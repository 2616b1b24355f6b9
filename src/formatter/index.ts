export { formatFlat } from './flat.ts'
export { formatCombined } from './combined.ts'
export { formatCsv, writeCsv, formatSignificant } from './csv.ts'
export { renderBarChart, writeBarChart, formatPercentLabel } from './chart.ts'
