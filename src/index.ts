export * from "./lib/address/ipv6";
export { calculateMaskLength, createHostMask, createPrefixMask } from "./lib/address/mask";
