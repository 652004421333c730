/**
 * pagewise - Events Domain
 */

export {
  createPublisher,
  type Publisher,
  type PublisherConfig,
} from "./publisher";
