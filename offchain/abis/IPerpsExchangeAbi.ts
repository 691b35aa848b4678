import { parseAbi } from 'viem';

// Account-level surface of the perps exchange used by sub-accounts.
export const IPerpsExchangeAbi = parseAbi([
  'struct OrderParams { uint256 marketId; bool isBuy; uint256 size; uint256 limitPrice; bool reduceOnly; }',
  'function getAccountEquity(address account) view returns (int256 equity, bool exists)',
  'function getWithdrawableAmount(address account, address token) view returns (uint256)',
  'function withdraw(address account, address token, uint256 amount) returns (uint256 withdrawn)',
  'function deposit(address account, address token, uint256 amount)',
  'function placeOrder(address account, OrderParams order) returns (uint256 orderId)',
  'function cancelOrder(address account, uint256 orderId)',
]);
