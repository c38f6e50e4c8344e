export const validateVaultId = (vaultId: string | undefined, validVaultIds: readonly string[]): boolean => {
  if (!vaultId) return false;
  return validVaultIds.includes(vaultId);
};
