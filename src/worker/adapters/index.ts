import { SITE_NAMES, type SiteName, type SourceAdapter } from "./SourceAdapter";
import { imotBgAdapter } from "./imotbg";
import { imotiNetAdapter } from "./imotinet";
import { homesBgAdapter } from "./homesbg";
import { suprimmoAdapter } from "./suprimmo";
import { aloBgAdapter } from "./alobg";
import { bazarBgAdapter } from "./bazarbg";
import { imotiComAdapter } from "./imoticom";
import { bulgarianPropertiesAdapter } from "./bulgarianproperties";
import { luximmoAdapter } from "./luximmo";
import type { LocationFormat } from "@/lib/domain/location";

export const ADAPTERS: Readonly<Record<SiteName, SourceAdapter>> = {
  ImotBg: imotBgAdapter,
  ImotiNet: imotiNetAdapter,
  HomesBg: homesBgAdapter,
  Suprimmo: suprimmoAdapter,
  AloBg: aloBgAdapter,
  BazarBg: bazarBgAdapter,
  ImotiCom: imotiComAdapter,
  BulgarianProperties: bulgarianPropertiesAdapter,
  Luximmo: luximmoAdapter,
};

export function getAdapter(site: SiteName): SourceAdapter {
  return ADAPTERS[site];
}

/** Per-site location formats for the transformer. */
export function locationFormats(): Map<string, LocationFormat> {
  return new Map(SITE_NAMES.map((site) => [site, ADAPTERS[site].config.locationFormat]));
}
