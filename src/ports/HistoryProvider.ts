import type { Scrobble } from "../core/history/history.types";
import type { PageSource } from "./ProviderClient";

export type { Scrobble };

export type HistoryProvider = PageSource<Scrobble>;
