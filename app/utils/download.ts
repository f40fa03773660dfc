/** Offer `text` to the browser as a file download. */
export const downloadText = (text: string, filename: string, mimeType: string): void => {
  const url = URL.createObjectURL(new Blob([text], { type: mimeType }))
  const link = document.createElement('a')
  link.href = url
  link.download = filename
  document.body.appendChild(link)
  link.click()
  link.remove()
  URL.revokeObjectURL(url)
}
