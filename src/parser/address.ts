import type { AddressObject, EmailAddress } from "mailparser";

export function formatAddress(name: string | undefined, address: string | undefined): string {
  const cleanName = name?.trim() ?? "";
  const cleanAddress = address?.trim() ?? "";
  if (cleanName && cleanAddress && cleanName !== cleanAddress) {
    return `${cleanName} <${cleanAddress}>`;
  }
  return cleanAddress || cleanName;
}

function flatten(addresses: EmailAddress[]): string[] {
  return addresses.flatMap((a) =>
    a.group ? flatten(a.group) : [formatAddress(a.name, a.address)]
  );
}

export function addressList(
  addr: AddressObject | AddressObject[] | undefined
): string[] {
  if (!addr) return [];
  const objects = Array.isArray(addr) ? addr : [addr];
  return objects.flatMap((o) => flatten(o.value)).filter(Boolean);
}
