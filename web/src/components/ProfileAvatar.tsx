'use client'

import { useState } from 'react'

export default function ProfileAvatar({ image, name, size = 32, className = '' }: {
  image?: string | null
  name?: string | null
  size?: number
  className?: string
}) {
  const [imgError, setImgError] = useState(false)

  if (image && !imgError) {
    return (
      <img
        src={image}
        alt=""
        width={size}
        height={size}
        className={`${className} rounded-full`}
        onError={() => setImgError(true)}
      />
    )
  }

  return (
    <span
      style={{ width: size, height: size }}
      className={`${className} rounded-full bg-accent/30 inline-flex items-center justify-center text-xs font-medium`}
    >
      {(name || 'U').charAt(0).toUpperCase()}
    </span>
  )
}
