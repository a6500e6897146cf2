export {
  aggregateScores,
  rankRows,
  countPasses,
  compareRows,
  scoreTotal,
  toCheckMatrix,
  type CheckMatrixRow,
} from './ScoreAggregator.js'
