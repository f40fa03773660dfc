'use client'
import './styles/globals.css'
import { ReactNode, useState } from 'react'
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import Header from './components/layout/Header'
import Footer from './components/layout/Footer'

export default function RootLayout({ children }: { children: ReactNode }) {
  const [queryClient] = useState(() => new QueryClient({
    defaultOptions: {
      mutations: {
        retry: 0,
      },
    },
  }))

  return (
    <html lang="en" className="h-full">
      <head>
        <title>PACE/PANCE Campaign Builder</title>
      </head>
      <body className="h-full bg-neutral-50 text-neutral-900 font-sans antialiased">
        <QueryClientProvider client={queryClient}>
          {/* Skip Link for Accessibility */}
          <a
            href="#main"
            className="sr-only focus:not-sr-only focus:absolute focus:top-6 focus:left-6 bg-primary-500 text-white px-4 py-2 rounded-md z-50 transition-all"
          >
            Skip to content
          </a>

          <div className="min-h-full flex flex-col">
            <Header />
            <main id="main" className="flex-1">
              {children}
            </main>
            <Footer />
          </div>
        </QueryClientProvider>
      </body>
    </html>
  )
}
