import type { Deployment, DeploymentSummary } from '../../types';

/**
 * Reduce a stored deployment to its listing summary
 */
export function summarizeDeployment(deployment: Deployment): DeploymentSummary {
  const sale = deployment.network.sales.find((entry) => entry.address === deployment.sale);

  return {
    id: deployment.id,
    createdAt: deployment.createdAt,
    sale: deployment.sale,
    token: deployment.token,
    totalSold: sale?.totalSold ?? '0',
    maxSupply: sale?.config.maxSupply ?? '0',
  };
}
