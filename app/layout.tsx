import type { Metadata } from "next";
import "./globals.css";
import { TopNav } from "@/components/TopNav";

export const metadata: Metadata = {
  title: {
    default: "Rent Charge Codes Extractor",
    template: "%s | Rent Charge Codes Extractor",
  },
  description:
    "Extract per-unit charge codes from Rent Roll and Affordable Rent Roll workbooks and append the totals beside each unit.",
  applicationName: "Rent Charge Codes Extractor",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en" suppressHydrationWarning>
      <body className="font-sans antialiased min-h-screen bg-[#0a0a0b] text-white">
        <TopNav />
        {children}
      </body>
    </html>
  );
}
