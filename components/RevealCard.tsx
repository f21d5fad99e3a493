"use client";

import { motion } from "framer-motion";

interface RevealCardProps {
  children: React.ReactNode;
  kicker?: string;
  title?: string;
  delay?: number;
}

export function RevealCard({ children, kicker, title, delay = 0 }: RevealCardProps) {
  return (
    <motion.section
      initial={{ opacity: 0, y: 20 }}
      animate={{ opacity: 1, y: 0 }}
      transition={{ duration: 0.5, delay, ease: [0.22, 1, 0.36, 1] }}
      className="surface-card p-4 sm:p-6 md:p-8"
    >
      {(kicker || title) && (
        <header className="mb-4">
          {kicker ? <p className="heading-kicker mb-1">{kicker}</p> : null}
          {title ? <h2 className="heading-section">{title}</h2> : null}
        </header>
      )}
      {children}
    </motion.section>
  );
}
