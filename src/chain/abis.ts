import { parseAbi, zeroAddress } from 'viem';

/**
 * Sentinel used by the exchange for the chain's native asset
 */
export const NATIVE_ASSET = zeroAddress;

export const routerAbi = parseAbi([
  'function anyToAnySwap(address[] _marketAddresses, bool[] _isBuy, bool[] _nativeSend, address _debitToken, address _creditToken, uint256 _amount, uint256 _minAmountOut) payable returns (uint256 _amountOut)'
]);

export const priceRouterAbi = parseAbi([
  'function calculatePriceOverRoute(address[] route, bool[] isBuy) view returns (uint256)'
]);
