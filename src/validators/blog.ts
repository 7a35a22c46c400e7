/**
 * Post and comment form schemas
 */

import { z } from 'zod';

const requiredText = (label: string, max?: number) => {
  const base = z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`);
  return max === undefined ? base : base.max(max, `${label} must be ${max} characters or less`);
};

/**
 * POST /new-post, POST /edit-post/:id
 * The form submits the cover image as `img_url`.
 */
export const postFormSchema = z
  .object({
    title: requiredText('Title', 250),
    subtitle: requiredText('Subtitle', 250),
    img_url: requiredText('Image URL', 250).url('Image URL must be a valid URL'),
    body: requiredText('Body'),
  })
  .transform(({ img_url, ...rest }) => ({ ...rest, imgUrl: img_url }));

/**
 * POST /post/:id
 */
export const commentFormSchema = z.object({
  comment: requiredText('Comment', 300),
});
