import Link from "next/link";

export function TopNav() {
  return (
    <header className="fixed top-0 left-0 right-0 z-50 print:hidden border-b border-white/20 bg-black/95 backdrop-blur-sm">
      <div className="app-container flex items-center justify-between gap-3 sm:gap-4 min-w-0 py-3">
        <Link href="/" className="text-sm sm:text-base font-semibold tracking-tight text-slate-100 rounded px-1 py-1">
          🏢 Rent Charge Codes Extractor
        </Link>
        <span className="text-xs text-slate-400">Rent Roll · Affordable Rent Roll</span>
      </div>
    </header>
  );
}
