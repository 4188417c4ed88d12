export { farmerRegistrationStage, computeCropIdHash } from './registration';
export { fpoPurchaseStage, computePurchaseBatchHash } from './purchase';
export { warehouseUpdateStage, computeWarehouseStateHash } from './warehouse';
export { logisticsMilestoneStage, computeLocationHash } from './logistics';
export { processBatchStage, computeProcessingHashes, type ProcessingHashes } from './processing';
export { createSkuStage, computeParentBatchHash, computeSkuMerkleRoot } from './packaging';
export { aiScoreStage, computeScoreBatchHash } from './ai-score';
